import { z } from "zod";

import { parseScaled } from "./decimal";

const DECIMAL2_RE = /^\d+(\.\d{1,2})?$/;

export function emptyStringToUndefined(value: unknown) {
  if (typeof value !== "string") return value;
  return value.trim() === "" ? undefined : value;
}

export function emptyStringToNull(value: unknown) {
  if (typeof value !== "string") return value;
  return value.trim() === "" ? null : value;
}

export const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "Invalid date (expected YYYY-MM-DD)");

/** Largest values of the numeric(8,2) and numeric(10,2) columns. */
export const NUMERIC_8_2_MAX = "999999.99";
export const NUMERIC_10_2_MAX = "99999999.99";

/**
 * Non-negative amount with at most two decimals, as a JSON number or string.
 * Output is the decimal string; callers scale it with toCents.
 * `max` is the column bound, numeric(10,2) when omitted.
 */
export const decimal2 = (field: string, opts: { positive?: boolean; max?: string } = {}) => {
  const max = opts.max ?? NUMERIC_10_2_MAX;
  return z
    .union([z.number(), z.string()])
    .transform((v) => (typeof v === "number" ? String(v) : v.trim()))
    .refine((v) => DECIMAL2_RE.test(v), `${field} : nombre décimal positif, 2 décimales maximum`)
    .refine((v) => !opts.positive || !DECIMAL2_RE.test(v) || parseScaled(v, 2) > 0n, `${field} doit être strictement positif`)
    .refine((v) => !DECIMAL2_RE.test(v) || parseScaled(v, 2) <= parseScaled(max, 2), `${field} ne peut pas dépasser ${max}`);
};

export const idParamsSchema = z.object({
  id: z.coerce.number().int().positive(),
});

export const paginationShape = {
  page: z.coerce.number().int().min(1).optional().default(1),
  pageSize: z.coerce.number().int().min(1).max(200).optional().default(20),
  sortDir: z.enum(["asc", "desc"]).optional().default("desc"),
};

export const optionalBoolean = z.preprocess((value) => {
  if (value === "true" || value === "1") return true;
  if (value === "false" || value === "0") return false;
  return value;
}, z.boolean().optional());

export const includeParam = (defaults: string) =>
  z
    .preprocess((value) => {
      if (value === undefined || value === null) return defaults;
      if (Array.isArray(value)) return value.join(",");
      if (typeof value === "string") return value;
      return defaults;
    }, z.string())
    .optional()
    .default(defaults);

export function includesSet(includeValue: string) {
  return new Set(
    includeValue
      .split(",")
      .map((x) => x.trim())
      .filter((x) => x.length > 0)
  );
}
