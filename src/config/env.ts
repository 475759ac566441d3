// src/config/env.ts
/** Environment loader: reads .env, validates with Zod, exports typed config and derived groups. */
import "dotenv/config";
import { z } from "zod";

const EnvSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().int().positive().default(3001),
  CORS_ORIGINS: z.string().default("http://localhost:5173,http://localhost:3000"),
  LOG_LEVEL: z.enum(["error", "warn", "info", "http", "verbose", "debug", "silly"]).default("info"),
  // Data layer
  MONGO_URI: z.string().default("mongodb://localhost:27017/rentwheels_dev?replicaSet=rs0"),
  REDIS_URL: z.string().default("redis://localhost:6379"),
  REDIS_NAMESPACE: z.string().default("rw:dev"),

  // Auth (tokens are issued by the identity service; we only verify them)
  JWT_SECRET: z
    .string()
    .min(16, "JWT_SECRET must be at least 16 chars")
    .default("dev_only_change_me"),
  JWT_ACCESS_TTL: z.coerce.number().int().positive().default(15 * 60), // seconds
  JWT_ISS: z.string().default("rw-api"),
  JWT_AUD: z.string().default("rw-clients"),

  // Payments
  STRIPE_SECRET_KEY: z.string().default("sk_test_placeholder"),
  PAYMENT_CURRENCY: z.string().trim().toLowerCase().default("inr"),
  PAYMENT_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  QUOTE_TTL_SECS: z.coerce.number().int().positive().default(30 * 60),

  // Pricing
  TAX_RATE_PCT: z.coerce.number().min(0).max(100).default(18),

  // Host notifications
  DEFAULT_COUNTRY_CODE: z.string().default("+91"),
  FCM_PROJECT_ID: z.string().optional().default(""),
  FCM_CLIENT_EMAIL: z.string().optional().default(""),
  FCM_PRIVATE_KEY: z.string().optional().default(""),
  APNS_TEAM_ID: z.string().optional().default(""),
  APNS_KEY_ID: z.string().optional().default(""),
  APNS_P8: z.string().optional().default(""),
  APNS_BUNDLE_ID: z.string().optional().default(""),
  APNS_ENV: z.enum(["dev", "prod"]).default("dev"),
});

export type Env = z.infer<typeof EnvSchema>;

const parsed = EnvSchema.safeParse(process.env);
if (!parsed.success) {
  // Pretty-print Zod issues then exit
  console.error("Invalid environment variables:", parsed.error.flatten().fieldErrors);
  process.exit(1);
}

export const env: Env = parsed.data;

// parsed CORS allowlist as array
export const corsOrigins = env.CORS_ORIGINS.split(",")
  .map((s) => s.trim())
  .filter(Boolean);

/** Returns the tax rate as a decimal (0.18 for "18"). */
export function getTaxRate(): number {
  return env.TAX_RATE_PCT / 100;
}

export const pushConfig = {
  fcm: {
    projectId: env.FCM_PROJECT_ID,
    clientEmail: env.FCM_CLIENT_EMAIL,
    // keys pasted into .env usually carry escaped newlines
    privateKey: env.FCM_PRIVATE_KEY.replace(/\\n/g, "\n"),
  },
  apns: {
    teamId: env.APNS_TEAM_ID,
    keyId: env.APNS_KEY_ID,
    p8: env.APNS_P8.replace(/\\n/g, "\n"),
    bundleId: env.APNS_BUNDLE_ID,
    env: env.APNS_ENV,
  },
};
