// ============================================================================
// VALIDATION MIDDLEWARE
// Zod schema validation for request bodies and query strings
// ============================================================================

import type { Request, Response, NextFunction } from "express";
import { ZodError, type ZodTypeAny } from "zod";
import { ValidationError } from "../errors/index.js";
import { logger } from "../utils/logger.js";

type ValidationTarget = "body" | "query";

/**
 * Validated bodies replace `req.body`. Express's `req.query` is a getter-backed
 * ParsedQs, so validated query values are handed on through `res.locals.query`.
 */
export function validateRequest(schema: ZodTypeAny, target: ValidationTarget = "body") {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const validated: unknown = await schema.parseAsync(target === "body" ? req.body : req.query);

      if (target === "body") {
        req.body = validated;
      } else {
        res.locals.query = validated;
      }

      next();
    } catch (error) {
      if (error instanceof ZodError) {
        const validationError = ValidationError.fromZod(error, target);

        logger.warn(
          {
            type: "validation_error",
            target,
            errors: validationError.details?.fields,
            path: req.path,
          },
          `Request ${target} validation failed`
        );

        next(validationError);
      } else {
        next(error);
      }
    }
  };
}

export const validateBody = (schema: ZodTypeAny) => validateRequest(schema, "body");

export const validateQuery = (schema: ZodTypeAny) => validateRequest(schema, "query");
