import { RATE_SCALE, roundHalfUp, sumCents, toCents } from "../../../utils/decimal";

/** 0.20 scaled by 10^4. */
export const DEFAULT_TVA_RATE = 2000n;

const RATE_DIVISOR = 10n ** BigInt(RATE_SCALE);

export type TaxSplit = {
  montant_tva: bigint;
  montant_ttc: bigint;
};

export type InvoiceTotals = {
  montant_ht: bigint;
  montant_tva: bigint;
  montant_ttc: bigint;
};

/** tva = round_half_up(ht × rate, 2), ttc = ht + tva. Amounts in cents, rate scaled by 10^4. */
export function splitTax(amountHt: bigint, taxRate: bigint = DEFAULT_TVA_RATE): TaxSplit {
  if (amountHt < 0n) throw new Error("splitTax expects a non-negative amount");
  if (taxRate < 0n) throw new Error("splitTax expects a non-negative rate");
  const montant_tva = roundHalfUp(amountHt * taxRate, RATE_DIVISOR);
  return { montant_tva, montant_ttc: amountHt + montant_tva };
}

export function priceInvoiceFromExpeditions(
  expeditions: readonly { montant: string }[],
  taxRate: bigint = DEFAULT_TVA_RATE
): InvoiceTotals {
  const montant_ht = sumCents(expeditions.map((e) => toCents(e.montant, "expedition.montant")));
  return { montant_ht, ...splitTax(montant_ht, taxRate) };
}
