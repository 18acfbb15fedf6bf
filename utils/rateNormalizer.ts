// utils/rateNormalizer.ts

/** Flat PIS/COFINS approximation used when the rate table brings nothing usable. */
export const DEFAULT_PIS_COFINS_RATE = 0.0925;

/**
 * Converts a rate read from a rate table into its fractional form.
 * Tables mix "18" and "0.18" for the same 18%; anything above 1.0 is read as a percentage.
 * A genuine fractional rate above 100% is therefore indistinguishable from a percentage
 * and gets divided as well.
 */
export const normalizeRate = (raw: number): number => (raw > 1.0 ? raw / 100 : raw);

/**
 * Mean of the normalized PIS/COFINS rates, or the flat default for an empty table.
 */
export const resolvePisCofinsRate = (rawRates: readonly number[]): number => {
  if (rawRates.length === 0) {
    return DEFAULT_PIS_COFINS_RATE;
  }
  const sum = rawRates.reduce((acc, rate) => acc + normalizeRate(rate), 0);
  return sum / rawRates.length;
};

/**
 * Indexes a rate table by key with every rate normalized. The last row wins on repeated keys.
 */
export const buildRateIndex = <Row, Key>(
  rows: readonly Row[] | null,
  keyOf: (row: Row) => Key,
  rateOf: (row: Row) => number,
): Map<Key, number> => {
  const index = new Map<Key, number>();
  for (const row of rows ?? []) {
    index.set(keyOf(row), normalizeRate(rateOf(row)));
  }
  return index;
};
