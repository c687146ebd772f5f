// ============================================================================
// CONFIGURATION MODULE
// Centralized, typed, validated configuration with environment variable support
// ============================================================================

import { z } from "zod";
import dotenv from "dotenv";

dotenv.config();

// zod's coerce.boolean() treats "false" as true
const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

// ----------------------------------------------------------------------------
// ENVIRONMENT SCHEMA
// ----------------------------------------------------------------------------

const envSchema = z.object({
  // Application
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: z.coerce.number().int().positive().default(3001),
  APP_NAME: z.string().default("hotel-availability-gateway"),
  APP_VERSION: z.string().default("0.1.0"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  PRETTY_LOGS: booleanFlag.default("false"),

  // CapCorn backend
  CAPCORN_BASE_URL: z.string().url().default("https://mainframe.capcorn.net/RestService"),
  CAPCORN_SYSTEM: z.string().default(""),
  CAPCORN_USER: z.string().default(""),
  CAPCORN_PASSWORD: z.string().default(""),
  CAPCORN_HOTEL_ID: z.string().default(""),
  CAPCORN_PIN: z.string().default(""),
  CAPCORN_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),

  // Analytics
  ANALYTICS_MAX_EVENTS: z.coerce.number().int().positive().default(10000),

  // Rate Limiting
  RATE_LIMIT_WINDOW_MS: z.coerce.number().default(60000),
  RATE_LIMIT_MAX_REQUESTS: z.coerce.number().default(100),

  // Timeouts
  REQUEST_TIMEOUT_MS: z.coerce.number().default(60000),
  KEEP_ALIVE_TIMEOUT_MS: z.coerce.number().default(65000),

  // Observability
  ENABLE_METRICS: booleanFlag.default("true"),
  METRICS_PATH: z.string().default("/metrics"),
  ENABLE_REQUEST_LOGGING: booleanFlag.default("true"),
  MASK_SENSITIVE_DATA: booleanFlag.default("true"),

  // Security
  CORS_ORIGINS: z.string().default("*"),
  TRUST_PROXY: booleanFlag.default("false"),
});

// ----------------------------------------------------------------------------
// PARSE AND VALIDATE
// ----------------------------------------------------------------------------

function loadConfig() {
  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    console.error("[x] Invalid environment configuration:");
    console.error(result.error.format());
    process.exit(1);
  }

  return result.data;
}

const env = loadConfig();

function parseCorsOrigins(raw: string): string[] {
  if (raw.trim() === "*") return ["*"];
  return raw
    .split(",")
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);
}

function deepFreeze<T extends object>(value: T): T {
  for (const key of Object.keys(value)) {
    const child: unknown = Reflect.get(value, key);
    if (typeof child === "object" && child !== null) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}

// ----------------------------------------------------------------------------
// STRUCTURED CONFIG EXPORT
// ----------------------------------------------------------------------------

export const config = deepFreeze({
  app: {
    name: env.APP_NAME,
    version: env.APP_VERSION,
    env: env.NODE_ENV,
    port: env.PORT,
    isDev: env.NODE_ENV === "development",
    isProd: env.NODE_ENV === "production",
    isTest: env.NODE_ENV === "test",
  },

  logging: {
    level: env.LOG_LEVEL,
    pretty: env.PRETTY_LOGS,
    enableRequestLogging: env.ENABLE_REQUEST_LOGGING,
    maskSensitiveData: env.MASK_SENSITIVE_DATA,
  },

  capcorn: {
    baseUrl: env.CAPCORN_BASE_URL,
    system: env.CAPCORN_SYSTEM,
    user: env.CAPCORN_USER,
    password: env.CAPCORN_PASSWORD,
    hotelId: env.CAPCORN_HOTEL_ID,
    pin: env.CAPCORN_PIN,
    requestTimeout: env.CAPCORN_REQUEST_TIMEOUT_MS,
    endpoints: {
      roomAvailability: "/RoomAvailability",
      reservation: "/OTA_HotelResNotifRQ",
    },
  },

  analytics: {
    maxEvents: env.ANALYTICS_MAX_EVENTS,
  },

  resilience: {
    rateLimit: {
      windowMs: env.RATE_LIMIT_WINDOW_MS,
      maxRequests: env.RATE_LIMIT_MAX_REQUESTS,
    },
    timeouts: {
      request: env.REQUEST_TIMEOUT_MS,
      keepAlive: env.KEEP_ALIVE_TIMEOUT_MS,
    },
  },

  metrics: {
    enabled: env.ENABLE_METRICS,
    path: env.METRICS_PATH,
  },

  security: {
    corsOrigins: parseCorsOrigins(env.CORS_ORIGINS),
    trustProxy: env.TRUST_PROXY,
  },
} as const);

export type Config = typeof config;
