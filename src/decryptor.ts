import { bit } from './crypto/boolean-functions';
import { permute, unpermute } from './crypto/permutation';
import { rotateLeft16, rotateRight16, rotation } from './crypto/rotation';
import { TRIGGERS } from './crypto/tables';
import { KeyTable } from './types';
import { validateKeyTable, validateRegionCount } from './utils/validators';

/** Applied to every word after the key stage, whatever the title. */
export const OUTPUT_XOR = 0x1a3a;

/** Key-independent stage: rotation by an address-derived shift, then a fixed bitswap. */
export function deobfuscate(cipher: number, address: number): number {
  return permute(rotateLeft16(cipher, rotation(address)));
}

/** Inverse of {@link deobfuscate}. */
export function obfuscate(value: number, address: number): number {
  return rotateRight16(unpermute(value), rotation(address));
}

/**
 * Decrypts IGS036 program words with one title's key.
 *
 * The key is held by reference and never written to. Word addresses are
 * word indices, so a region starting at the beginning of the ROM uses the
 * buffer index as its address.
 */
export class Decryptor {
  constructor(private readonly key: KeyTable) {
    validateKeyTable(key);
  }

  /** Toggles the key-enabled bits whose trigger matches the high address bits. Self-inverse. */
  applyKeyXor(value: number, address: number): number {
    const mask = this.key[address & 0xff];
    const high = address >>> 8;
    let out = value;
    TRIGGERS.forEach(({ mask: triggerMask, match }, i) => {
      if (bit(mask, i) && (high & triggerMask) === match) {
        out ^= 1 << i;
      }
    });
    return out;
  }

  decryptWord(cipher: number, address: number): number {
    return this.applyKeyXor(deobfuscate(cipher, address), address) ^ OUTPUT_XOR;
  }

  encryptWord(plain: number, address: number): number {
    return obfuscate(this.applyKeyXor(plain ^ OUTPUT_XOR, address), address);
  }

  decryptRegion(rom: Uint16Array, count: number = rom.length): void {
    validateRegionCount(count, rom.length);
    for (let i = 0; i < count; i++) {
      rom[i] = this.decryptWord(rom[i], i);
    }
  }

  encryptRegion(rom: Uint16Array, count: number = rom.length): void {
    validateRegionCount(count, rom.length);
    for (let i = 0; i < count; i++) {
      rom[i] = this.encryptWord(rom[i], i);
    }
  }
}
