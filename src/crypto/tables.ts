import { BooleanFunctionName } from './boolean-functions';
import { RotationGroup, TriggerPair } from '../types';

type Row4 = readonly [BooleanFunctionName, BooleanFunctionName, BooleanFunctionName, BooleanFunctionName];
type Row8 = readonly [
  BooleanFunctionName,
  BooleanFunctionName,
  BooleanFunctionName,
  BooleanFunctionName,
  BooleanFunctionName,
  BooleanFunctionName,
  BooleanFunctionName,
  BooleanFunctionName,
];

/**
 * Conditions under which each of the 16 one-bit XORs fires, tested against
 * the high 16 bits of the word address. Entry 10 is a guess: no title has
 * been observed exercising it.
 */
export const TRIGGERS: readonly TriggerPair[] = [
  { mask: 0x0001, match: 0x0000 },
  { mask: 0x0008, match: 0x0008 },
  { mask: 0x0002, match: 0x0000 },
  { mask: 0x0004, match: 0x0004 },
  { mask: 0x0100, match: 0x0000 },
  { mask: 0x0200, match: 0x0000 },
  { mask: 0x0400, match: 0x0000 },
  { mask: 0x0800, match: 0x0800 },
  { mask: 0x1001, match: 0x0001 },
  { mask: 0x2002, match: 0x2000 },
  { mask: 0x4004, match: 0x4000 },
  { mask: 0x8008, match: 0x0000 },
  { mask: 0x0010, match: 0x0010 },
  { mask: 0x0020, match: 0x0020 },
  { mask: 0x0040, match: 0x0000 },
  { mask: 0x0081, match: 0x0081 },
];

export const GUESSED_TRIGGERS: readonly number[] = [10];

/**
 * Rotation enabling function per high-address bit position (row), selected
 * by the two low bits of the probed address (column).
 */
export const ROT_ENABLING: readonly Row4[] = [
  ['bit3', 'not3', 'bit3', 'not3'],
  ['bit3', 'not3', 'bit3', 'not3'],
  ['bit4', 'bit4', 'bit4', 'bit4'],
  ['bit4', 'not4', 'bit4', 'not4'],
  ['bit3', 'bit3', 'bit3', 'bit3'],
  ['nor34', 'bit7', 'bit7', 'zero'],
  ['zero', 'one', 'zero', 'one'],
  ['implies43', 'xor37', 'xnor37', 'not3'],
  ['bit3', 'bit3', 'not3', 'not3'],
  ['bit4', 'bit4', 'not4', 'not4'],
  ['zero', 'zero', 'zero', 'zero'],
  ['nor34', 'bit7', 'not7', 'one'],
  ['bit3', 'not3', 'bit3', 'not3'],
  ['zero', 'one', 'one', 'zero'],
  // Bits 22 and 23 are beyond every known ROM; unverified.
  ['unknown', 'unknown', 'unknown', 'unknown'],
  ['unknown', 'unknown', 'unknown', 'unknown'],
];

export const UNVERIFIED_ENABLING_POSITIONS: readonly number[] = ROT_ENABLING.flatMap((row, position) =>
  row.every((name) => name === 'unknown') ? [position] : [],
);

/**
 * Rotation direction function per group (row, the group's first position
 * modulo 4), selected by the three low address bits (column).
 */
export const ROT_DIRECTION: readonly Row8[] = [
  ['bit3', 'xor37', 'xnor37', 'not3', 'bit3', 'xor37', 'xnor37', 'not3'],
  ['zero', 'not7', 'not7', 'zero', 'zero', 'not7', 'not7', 'zero'],
  ['bit4', 'xor47', 'xnor47', 'not4', 'bit4', 'xor47', 'xnor47', 'not4'],
  ['bit3', 'not7', 'bit7', 'zero', 'one', 'not7', 'bit7', 'zero'],
];

// Positions 15 and 14 lead their groups only by assumption.
export const ROTATION_GROUPS: readonly RotationGroup[] = [
  { positions: [15, 11, 7, 5], weight: 9 },
  { positions: [14, 9, 3, 2], weight: 1 },
  { positions: [13, 10, 6, 1], weight: 2 },
  { positions: [12, 8, 4, 0], weight: 4 },
];
