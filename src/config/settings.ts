import dotenv from "dotenv";
import { z } from "zod";

import { parseScaled, toRate } from "../utils/decimal";

dotenv.config();

const booleanish = z.preprocess((value) => {
  if (typeof value !== "string") return value;
  return ["1", "true", "yes", "on"].includes(value.trim().toLowerCase());
}, z.boolean());

const decimalString = z
  .string()
  .trim()
  .regex(/^\d+(\.\d+)?$/, "Expected a non-negative decimal");

const positiveInt = z.coerce.number().int().positive();

export const envSchema = z.object({
  NODE_ENV: z.string().optional().default("development"),
  PORT: z.coerce.number().int().positive().default(5000),
  DATABASE_URL: z.string().optional(),
  PG_POOL_MAX: positiveInt.default(10),
  PG_STATEMENT_TIMEOUT_MS: positiveInt.default(15000),
  LOG_LEVEL: z.enum(["error", "warn", "info", "debug"]).default("info"),
  JWT_SECRET: z.string().min(1, "JWT_SECRET is required"),
  TVA_RATE: decimalString.default("0.20"),
  TOUR_KM_PER_EXPEDITION: decimalString.default("50"),
  JOBS_ENABLED: booleanish.default(true),
  SWEEP_INTERVAL_MINUTES: positiveInt.default(15),
  SWEEP_CREATED_TO_TRANSIT_HOURS: positiveInt.default(1),
  SWEEP_TRANSIT_TO_SORTING_HOURS: positiveInt.default(24),
  SWEEP_SORTING_TO_DELIVERY_HOURS: positiveInt.default(24),
  SWEEP_AUTO_DELIVER_DAYS: z.coerce.number().int().min(0).default(7),
  RECONCILE_INTERVAL_MINUTES: positiveInt.default(60),
  ARCHIVE_AFTER_DAYS: positiveInt.default(365),
});

export type Env = z.infer<typeof envSchema>;

export type Settings = Readonly<
  Env & {
    /** TVA_RATE scaled by 10^4 (0.20 -> 2000n). */
    tvaRate: bigint;
    /** TOUR_KM_PER_EXPEDITION in hundredths of km. */
    tourKmPerExpedition: bigint;
  }
>;

export function loadSettings(source: NodeJS.ProcessEnv): Settings {
  const env = envSchema.parse(source);
  return Object.freeze({
    ...env,
    tvaRate: toRate(env.TVA_RATE, "TVA_RATE"),
    tourKmPerExpedition: parseScaled(env.TOUR_KM_PER_EXPEDITION, 2, "TOUR_KM_PER_EXPEDITION"),
  });
}

export const settings = loadSettings(process.env);
