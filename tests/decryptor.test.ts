import { Decryptor, OUTPUT_XOR, deobfuscate, obfuscate } from '../src/decryptor';
import { getTitleKey } from '../src/keys';

const zeroKey: number[] = new Array<number>(256).fill(0);
const onesKey: number[] = new Array<number>(256).fill(0xffff);

// Small deterministic generator for sampled inputs.
function* lcg(seed: number, count: number): Generator<number> {
  let s = seed >>> 0;
  for (let i = 0; i < count; i++) {
    s = (Math.imul(s, 1664525) + 1013904223) >>> 0;
    yield s;
  }
}

describe('Decryptor', () => {
  describe('deobfuscate', () => {
    test('should be the identity on 0 and 0xffff at address 0', () => {
      expect(deobfuscate(0x0000, 0)).toBe(0x0000);
      expect(deobfuscate(0xffff, 0)).toBe(0xffff);
    });

    test('should rotate then permute', () => {
      expect(deobfuscate(0x1234, 0)).toBe(0x412a);
      expect(deobfuscate(0x1234, 0x8a5d)).toBe(0x01c6);
      expect(deobfuscate(0x1234, 0x2a0f7)).toBe(0x4603);
    });

    test('obfuscate should invert deobfuscate', () => {
      for (const r of lcg(1, 2000)) {
        const address = r >>> 8;
        const word = r & 0xffff;
        expect(obfuscate(deobfuscate(word, address), address)).toBe(word);
      }
    });

    test('should be a bijection on 16-bit words for a fixed address', () => {
      for (const address of [0, 0x8a5d, 0x3fffff]) {
        const seen = new Uint8Array(0x10000);
        for (let word = 0; word < 0x10000; word++) {
          seen[deobfuscate(word, address)] = 1;
        }
        expect(seen.every((v) => v === 1)).toBe(true);
      }
    });
  });

  describe('decryptWord', () => {
    test('should produce 0x1a3a for a zero word at address 0 with a zero key', () => {
      const decryptor = new Decryptor(zeroKey);
      expect(decryptor.decryptWord(0x0000, 0)).toBe(0x1a3a);
    });

    test('should produce 0xe5c5 for 0xffff at address 0 with a zero key', () => {
      const decryptor = new Decryptor(zeroKey);
      expect(decryptor.decryptWord(0xffff, 0)).toBe(0xe5c5);
    });

    test('should reduce to deobfuscation and the output XOR when the key entry is 0', () => {
      const decryptor = new Decryptor(zeroKey);
      for (const r of lcg(7, 500)) {
        const address = r >>> 8;
        const word = r & 0xffff;
        expect(decryptor.decryptWord(word, address)).toBe(deobfuscate(word, address) ^ OUTPUT_XOR);
      }
    });

    test('should decrypt with a title key', () => {
      const decryptor = new Decryptor(getTitleKey('kov3').key);
      expect(decryptor.decryptWord(0x1234, 0)).toBe(0x5b10);
      expect(decryptor.decryptWord(0x1234, 0x100)).toBe(0x5a10);
      expect(decryptor.decryptWord(0x1234, 0x123)).toBe(0x9373);
      expect(decryptor.decryptWord(0x1234, 0x8a5d)).toBe(0x5bbc);
      expect(decryptor.decryptWord(0x1234, 0x12345)).toBe(0x7a10);
      expect(decryptor.decryptWord(0x1234, 0x3fffff)).toBe(0x9b7c);
    });

    test('should apply a suspect key faithfully', () => {
      const decryptor = new Decryptor(getTitleKey('ddpdoj').key);
      expect(decryptor.decryptWord(0xbeef, 0x1f3)).toBe(0xbcc4);
    });

    test('should be deterministic', () => {
      const decryptor = new Decryptor(getTitleKey('orleg2').key);
      expect(decryptor.decryptWord(0x4321, 0x1abcd)).toBe(decryptor.decryptWord(0x4321, 0x1abcd));
    });
  });

  describe('applyKeyXor', () => {
    test('should toggle only bits whose trigger matches the high address bits', () => {
      const decryptor = new Decryptor(onesKey);
      expect(decryptor.applyKeyXor(0, 0)).toBe(0x4875);
      expect(decryptor.applyKeyXor(0, 0x100)).toBe(0x4974);
      expect(decryptor.applyKeyXor(0, 0x7fff00)).toBe(0xb08a);
    });

    test('should be its own inverse', () => {
      const decryptor = new Decryptor(getTitleKey('kov2').key);
      expect(decryptor.applyKeyXor(decryptor.applyKeyXor(0x5a5a, 0x2a0f7), 0x2a0f7)).toBe(0x5a5a);
    });
  });

  describe('encryptWord', () => {
    test('should invert decryptWord', () => {
      const decryptor = new Decryptor(getTitleKey('cjdh2').key);
      for (const r of lcg(42, 2000)) {
        const address = r >>> 8;
        const word = r & 0xffff;
        expect(decryptor.encryptWord(decryptor.decryptWord(word, address), address)).toBe(word);
      }
      expect(new Decryptor(getTitleKey('kov3').key).encryptWord(0x5b10, 0)).toBe(0x1234);
    });
  });

  describe('decryptRegion', () => {
    const words = [0x1234, 0xabcd, 0x0000, 0xffff, 0x5a5a, 0x00ff, 0xf00f, 0x7777];

    test('should decrypt each word with its index as address', () => {
      const rom = Uint16Array.from(words);
      new Decryptor(getTitleKey('kov3').key).decryptRegion(rom);
      expect(Array.from(rom)).toEqual([0x5b10, 0x41df, 0x1a3a, 0xe5c4, 0x5883, 0x178d, 0x178d, 0xf9d0]);
    });

    test('should match word-by-word decryption', () => {
      const decryptor = new Decryptor(getTitleKey('m312cn').key);
      const rom = Uint16Array.from(lcg(3, 1024), (r) => r & 0xffff);
      const expected = Array.from(rom, (w, i) => decryptor.decryptWord(w, i));
      decryptor.decryptRegion(rom);
      expect(Array.from(rom)).toEqual(expected);
    });

    test('should leave words past count untouched', () => {
      const rom = Uint16Array.from(words);
      new Decryptor(zeroKey).decryptRegion(rom, 2);
      expect(Array.from(rom)).toEqual([0x5b10, 0x41df, 0x0000, 0xffff, 0x5a5a, 0x00ff, 0xf00f, 0x7777]);
    });

    test('encryptRegion should restore the original words', () => {
      const decryptor = new Decryptor(getTitleKey('cjddzsp').key);
      const rom = Uint16Array.from(words);
      decryptor.decryptRegion(rom);
      decryptor.encryptRegion(rom);
      expect(Array.from(rom)).toEqual(words);
    });

    test('should reject a count outside the buffer before touching it', () => {
      const rom = Uint16Array.from(words);
      const decryptor = new Decryptor(zeroKey);
      expect(() => decryptor.decryptRegion(rom, 9)).toThrow(RangeError);
      expect(() => decryptor.decryptRegion(rom, -1)).toThrow('outside the buffer');
      expect(Array.from(rom)).toEqual(words);
    });
  });

  describe('construction', () => {
    test('should reject keys without 256 entries', () => {
      expect(() => new Decryptor(new Array<number>(255).fill(0))).toThrow('expected 256 entries, got 255');
    });

    test('should reject entries that are not 16-bit values', () => {
      const key = new Array<number>(256).fill(0);
      key[17] = 0x10000;
      expect(() => new Decryptor(key)).toThrow('entry 17 is not a 16-bit value (65536)');
    });

    test('should keep the key by reference without modifying it', () => {
      const key = getTitleKey('kov3').key;
      const before = [...key];
      new Decryptor(key).decryptRegion(new Uint16Array(300));
      expect(key).toEqual(before);
      expect(Object.isFrozen(key)).toBe(true);
    });
  });
});
