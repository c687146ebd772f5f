// ============================================================================
// COMPRESSION MIDDLEWARE
// Response compression for large sweep results
// ============================================================================

import compression from "compression";
import type { Request, Response } from "express";

/**
 * Determine if response should be compressed
 */
function shouldCompress(req: Request, res: Response): boolean {
  // Client opted out
  if (req.headers["x-no-compression"]) {
    return false;
  }

  // Everything else follows the Accept-Encoding / content-type defaults
  return compression.filter(req, res);
}

// Sweep responses list every option of every window and grow quickly
export const compressionMiddleware = compression({
  filter: shouldCompress,
  level: 6, // Balanced compression level
  threshold: 1024, // Error envelopes and probes stay uncompressed
});
