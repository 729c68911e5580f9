// Fixed-point helpers. Money, weights, volumes and rates are carried as
// scaled bigints (hundredths unless stated) and never pass through float math.

const DECIMAL_RE = /^(-)?(\d+)(?:\.(\d+))?$/;

export const CENT_SCALE = 2;
export const RATE_SCALE = 4;

/** Parses "12.5" / 12.5 into 1250n for scale 2. Rejects exponents and precision loss. */
export function parseScaled(value: string | number, scale: number, label = "value"): bigint {
  const raw = typeof value === "number" ? String(value) : value.trim();
  const m = DECIMAL_RE.exec(raw);
  if (!m) throw new Error(`Invalid ${label}: ${raw}`);

  const negative = m[1] === "-";
  const intPart = m[2] ?? "0";
  let frac = m[3] ?? "";

  if (frac.length > scale) {
    if (!/^0+$/.test(frac.slice(scale))) {
      throw new Error(`Invalid ${label}: ${raw} (max ${scale} decimals)`);
    }
    frac = frac.slice(0, scale);
  }

  const scaled = BigInt(intPart + frac.padEnd(scale, "0"));
  return negative ? -scaled : scaled;
}

/** Integer division rounding half away from zero. */
export function roundHalfUp(numerator: bigint, divisor: bigint): bigint {
  if (divisor <= 0n) throw new Error("roundHalfUp: divisor must be positive");
  const negative = numerator < 0n;
  const abs = negative ? -numerator : numerator;
  const q = (abs * 2n + divisor) / (2n * divisor);
  return negative ? -q : q;
}

export function toCents(value: string | number, label = "amount"): bigint {
  return parseScaled(value, CENT_SCALE, label);
}

export function toRate(value: string | number, label = "rate"): bigint {
  return parseScaled(value, RATE_SCALE, label);
}

export function formatScaled(value: bigint, scale: number): string {
  const negative = value < 0n;
  const digits = (negative ? -value : value).toString().padStart(scale + 1, "0");
  const intPart = digits.slice(0, digits.length - scale);
  const frac = digits.slice(digits.length - scale);
  const body = scale > 0 ? `${intPart}.${frac}` : intPart;
  return negative ? `-${body}` : body;
}

/** 9000n -> "90.00" */
export function formatCents(cents: bigint): string {
  return formatScaled(cents, CENT_SCALE);
}

export function sumCents(values: readonly bigint[]): bigint {
  return values.reduce((acc, v) => acc + v, 0n);
}
