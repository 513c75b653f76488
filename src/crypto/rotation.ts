import { bit, evaluate } from './boolean-functions';
import { ROT_DIRECTION, ROT_ENABLING, ROTATION_GROUPS } from './tables';
import { Bit, RotationGroup } from '../types';

export function rotateLeft16(value: number, shift: number): number {
  const s = shift & 0xf;
  if (s === 0) return value & 0xffff;
  return ((value << s) | ((value & 0xffff) >>> (16 - s))) & 0xffff;
}

export function rotateRight16(value: number, shift: number): number {
  return rotateLeft16(value, 16 - (shift & 0xf));
}

/**
 * Whether a group's rotation is active. Only the first of the group's
 * high-address bits found set decides; with none set the group is off.
 */
export function rotEnabled(address: number, group: RotationGroup): Bit {
  for (const position of group.positions) {
    if (bit(address, 8 + position)) {
      const probe = bit(address, 2) ? address ^ 0x1b : address;
      return evaluate(ROT_ENABLING[position][probe & 3], probe);
    }
  }
  return 0;
}

export function rotDirection(address: number, group: RotationGroup): -1 | 1 {
  const row = ROT_DIRECTION[group.positions[0] & 3];
  return evaluate(row[address & 7], address) === 1 ? 1 : -1;
}

/** Rotation driven by the high address bits, before masking. */
export function groupRotation(address: number): number {
  const [leader, ...others] = ROTATION_GROUPS;
  const leaderEnabled = rotEnabled(address, leader);
  let rot = leaderEnabled * rotDirection(address, leader) * leader.weight;
  for (const group of others) {
    // An active leader inverts the other groups' enable state.
    const enabled = leaderEnabled ^ rotEnabled(address, group);
    rot += enabled * rotDirection(address, group) * group.weight;
  }
  return rot;
}

/** Rotation driven only by bits 0, 1, 3, 4 and 7 of the address. */
export function blockRotation(address: number): number {
  const b0 = bit(address, 0);
  const b1 = bit(address, 1);
  const b3 = bit(address, 3);
  const b4 = bit(address, 4);
  const b7 = bit(address, 7);
  const sign = b0 * 2 - 1;

  let rot = 4 * b0;
  rot += b4 * sign;
  rot += 4 * b3 * sign;
  rot *= (b7 | (b0 ^ b1 ^ 1)) * 2 - 1;
  rot += 2 * ((b0 ^ b1) & (b7 ^ 1));
  return rot;
}

export function rotation(address: number): number {
  return (groupRotation(address) + blockRotation(address)) & 0xf;
}
