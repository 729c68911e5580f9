function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

export function toInt(value: unknown, label = "id"): number {
  if (typeof value === "number" && Number.isInteger(value)) return value;
  if (typeof value === "string" && /^\d+$/.test(value)) return Number.parseInt(value, 10);
  throw new Error(`Invalid ${label}: ${String(value)}`);
}

export type PgErrorInfo = { code: string | null; constraint: string | null };

export function getPgErrorInfo(err: unknown): PgErrorInfo {
  if (!isRecord(err)) return { code: null, constraint: null };
  const code = typeof err.code === "string" ? err.code : null;
  const constraint = typeof err.constraint === "string" ? err.constraint : null;
  return { code, constraint };
}

export function sortDirection(sortDir: "asc" | "desc" | undefined) {
  return sortDir === "asc" ? "ASC" : "DESC";
}

export type ListWhere = { whereSql: string; values: unknown[] };

/** Collects positional parameters for a dynamic WHERE clause. */
export function createParams(values: unknown[] = []) {
  const push = (v: unknown) => {
    values.push(v);
    return `$${values.length}`;
  };
  return { values, push };
}

/** Renders a timestamptz column as an ISO-8601 UTC string. */
export const isoTs = (column: string) => `to_char(${column} AT TIME ZONE 'UTC', 'YYYY-MM-DD"T"HH24:MI:SS.MS"Z"')`;
