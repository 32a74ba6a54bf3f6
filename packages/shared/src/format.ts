/**
 * Scale a raw integer balance by `decimals` and render it with exactly
 * `decimals` fraction digits. Zero or missing balances render as "0".
 */
export function formatBalance(raw: string | bigint | null | undefined, decimals: number): string {
  if (raw === null || raw === undefined || raw === "") return "0";
  const value = typeof raw === "string" ? BigInt(raw.split(".")[0] ?? "0") : raw;
  if (value === 0n) return "0";
  const negative = value < 0n;
  const abs = negative ? -value : value;
  const divisor = 10n ** BigInt(decimals);
  const whole = abs / divisor;
  const remainder = abs % divisor;
  const fraction = decimals > 0 ? "." + remainder.toString().padStart(decimals, "0") : "";
  return `${negative ? "-" : ""}${whole}${fraction}`;
}

/**
 * Share of `raw` (in base units) relative to `totalIssuance` (in whole
 * tokens), as a percentage rounded half-to-even to `digits` places.
 */
export function percentageOf(
  raw: string | null | undefined,
  decimals: number,
  totalIssuance: string,
  digits = 2,
): string {
  if (raw === null || raw === undefined || raw === "") return "0";
  const value = BigInt(raw.split(".")[0] ?? "0");
  if (value === 0n) return "0";

  // value / 10^decimals / total * 100, scaled by 10^digits
  const numerator = value * 100n * 10n ** BigInt(digits);
  const denominator = 10n ** BigInt(decimals) * BigInt(totalIssuance);
  let quotient = numerator / denominator;
  const remainder = numerator % denominator;
  const twice = remainder * 2n;
  if (twice > denominator || (twice === denominator && quotient % 2n === 1n)) quotient += 1n;

  const scale = 10n ** BigInt(digits);
  const whole = quotient / scale;
  const fraction = (quotient % scale).toString().padStart(digits, "0");
  return digits > 0 ? `${whole}.${fraction}` : whole.toString();
}

/** Convert a raw balance to a float in whole tokens, for chart series */
export function toTokenFloat(raw: string | null | undefined, decimals: number): number {
  if (!raw) return 0;
  return Number(raw) / 10 ** decimals;
}
