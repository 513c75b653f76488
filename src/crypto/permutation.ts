import { bit } from './boolean-functions';

/** Source bit for each output bit, from bit 15 down to bit 0. */
export const PERMUTATION_SOURCES: readonly number[] = [10, 9, 8, 7, 0, 15, 6, 5, 14, 13, 4, 3, 12, 11, 2, 1];

export function permute(value: number): number {
  let out = 0;
  PERMUTATION_SOURCES.forEach((source, i) => {
    out |= bit(value, source) << (15 - i);
  });
  return out;
}

export function unpermute(value: number): number {
  let out = 0;
  PERMUTATION_SOURCES.forEach((source, i) => {
    out |= bit(value, 15 - i) << source;
  });
  return out;
}
