import * as fs from 'fs';

/** Splits an image into little-endian 16-bit words; word i holds bytes 2i and 2i+1. */
export function wordsFromBytes(bytes: Uint8Array): Uint16Array {
  if (bytes.length % 2 !== 0) {
    throw new RangeError(`ROM image has an odd length (${bytes.length} bytes)`);
  }
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const words = new Uint16Array(bytes.length / 2);
  for (let i = 0; i < words.length; i++) {
    words[i] = view.getUint16(i * 2, true);
  }
  return words;
}

export function bytesFromWords(words: Uint16Array): Buffer {
  const bytes = Buffer.alloc(words.length * 2);
  words.forEach((word, i) => {
    bytes.writeUInt16LE(word, i * 2);
  });
  return bytes;
}

export function loadRom(filePath: string): Uint16Array {
  if (!fs.existsSync(filePath)) {
    throw new Error(`ROM image not found at ${filePath}`);
  }
  return wordsFromBytes(fs.readFileSync(filePath));
}

export async function saveRom(filePath: string, words: Uint16Array): Promise<void> {
  await fs.promises.writeFile(filePath, bytesFromWords(words));
}
