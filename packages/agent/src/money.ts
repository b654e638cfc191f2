import { formatUnits, parseUnits } from "viem";

/** Collateral precision. Every price, cost and size is an integer at this scale. */
export const USD_DECIMALS = 6;
export const ONE_DOLLAR = 10n ** BigInt(USD_DECIMALS);

/** Sizes are rounded down to a hundredth of a share. */
const SIZE_STEP = ONE_DOLLAR / 100n;

export function toMicros(value: string | number): bigint {
  const text = typeof value === "number" ? value.toFixed(USD_DECIMALS) : value.trim();
  return parseUnits(text, USD_DECIMALS);
}

export function formatUsd(value: bigint): string {
  return formatUnits(value, USD_DECIMALS);
}

/** Lossy; only for handing values to APIs that take JS numbers. */
export function toNumber(value: bigint): number {
  return Number(formatUnits(value, USD_DECIMALS));
}

/** price × size, both at micro scale. */
export function costOf(price: bigint, size: bigint): bigint {
  return (price * size) / ONE_DOLLAR;
}

/**
 * Largest share count, in hundredths, whose pair cost stays within `budget`.
 */
export function sizeForBudget(budget: bigint, pairCost: bigint): bigint {
  if (pairCost <= 0n) return 0n;
  const raw = (budget * ONE_DOLLAR) / pairCost;
  return (raw / SIZE_STEP) * SIZE_STEP;
}
