import { Bit } from '../types';

/**
 * Single-bit functions of the low word-address bits.
 *
 * Only bits 3, 4 and 7 are ever consulted. Many functionally equivalent
 * formulations exist; these reproduce the observed behaviour, not
 * necessarily the gates the hardware uses.
 */

export type AddressFunction = (address: number) => Bit;

export type BooleanFunctionName =
  | 'zero'
  | 'one'
  | 'bit3'
  | 'bit4'
  | 'bit7'
  | 'not3'
  | 'not4'
  | 'not7'
  | 'xor37'
  | 'xnor37'
  | 'xor47'
  | 'xnor47'
  | 'nor34'
  | 'implies43'
  | 'unknown';

export function bit(value: number, n: number): Bit {
  return ((value >>> n) & 1) === 1 ? 1 : 0;
}

const invert = (b: Bit): Bit => (b === 1 ? 0 : 1);

export const BOOLEAN_FUNCTIONS: Readonly<Record<BooleanFunctionName, AddressFunction>> = {
  zero: () => 0,
  one: () => 1,
  bit3: (address) => bit(address, 3),
  bit4: (address) => bit(address, 4),
  bit7: (address) => bit(address, 7),
  not3: (address) => invert(bit(address, 3)),
  not4: (address) => invert(bit(address, 4)),
  not7: (address) => invert(bit(address, 7)),
  xor37: (address) => (bit(address, 3) === bit(address, 7) ? 0 : 1),
  xnor37: (address) => (bit(address, 3) === bit(address, 7) ? 1 : 0),
  xor47: (address) => (bit(address, 4) === bit(address, 7) ? 0 : 1),
  xnor47: (address) => (bit(address, 4) === bit(address, 7) ? 1 : 0),
  nor34: (address) => (bit(address, 3) === 0 && bit(address, 4) === 0 ? 1 : 0),
  implies43: (address) => (bit(address, 3) === 1 || bit(address, 4) === 0 ? 1 : 0),
  // Stands in for entries never seen firing. Always 0.
  unknown: () => 0,
};

export function evaluate(name: BooleanFunctionName, address: number): Bit {
  return BOOLEAN_FUNCTIONS[name](address);
}
