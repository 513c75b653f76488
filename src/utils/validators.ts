import { KeyTable } from '../types';

export const KEY_TABLE_SIZE = 0x100;

export function isWord(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0 && value <= 0xffff;
}

/**
 * Checks that a key table holds one 16-bit mask per low address byte.
 */
export function validateKeyTable(
  values: readonly unknown[],
  source = 'key table',
): asserts values is KeyTable {
  if (values.length !== KEY_TABLE_SIZE) {
    throw new RangeError(`${source}: expected ${KEY_TABLE_SIZE} entries, got ${values.length}`);
  }
  values.forEach((value, index) => {
    if (!isWord(value)) {
      throw new RangeError(`${source}: entry ${index} is not a 16-bit value (${String(value)})`);
    }
  });
}

export function validateRegionCount(count: number, length: number): void {
  if (!Number.isInteger(count) || count < 0 || count > length) {
    throw new RangeError(`Word count ${count} is outside the buffer (0..${length})`);
  }
}
