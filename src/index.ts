import * as path from 'path';

import { analyzeImage } from './analysis';
import { Igs036Config, defaultConfig } from './config';
import { Decryptor } from './decryptor';
import { calculateEntropy } from './heuristics/entropy';
import { getTitleKey } from './keys';
import { bytesFromWords, loadRom, saveRom } from './rom';
import { CryptMode, DecryptionReport, KeySource } from './types';
import { loadKeyFile } from './utils/key-file';

export { Decryptor, OUTPUT_XOR, deobfuscate, obfuscate } from './decryptor';
export { rotation, blockRotation, groupRotation, rotEnabled, rotDirection } from './crypto/rotation';
export { permute, unpermute } from './crypto/permutation';
export { getTitleKey, listTitles, isKnownTitle } from './keys';
export { loadKeyFile, parseKeyCsv, parseKeyJson } from './utils/key-file';
export { validateKeyTable } from './utils/validators';
export { wordsFromBytes, bytesFromWords, loadRom, saveRom } from './rom';
export { analyzeImage } from './analysis';
export { loadConfig } from './config';
export type { Igs036Config } from './config';
export type {
  Bit,
  CryptMode,
  DecryptionReport,
  Finding,
  KeySource,
  KeyStatus,
  KeyTable,
  RotationGroup,
  Severity,
  TriggerPair,
} from './types';

export interface KeyOptions {
  title?: string;
  keyFile?: string;
  config?: Igs036Config;
}

/**
 * Picks the key table: an explicit key file first, then the title, looked
 * up in the configured key files before the bundled tables.
 */
export function resolveKey(options: KeyOptions): KeySource {
  const config = options.config ?? defaultConfig;
  if (options.keyFile) {
    const keyFile = path.resolve(options.keyFile);
    return {
      title: options.title ?? path.basename(keyFile, path.extname(keyFile)),
      status: 'external',
      key: loadKeyFile(keyFile),
    };
  }
  const title = options.title ?? config.title;
  if (!title) {
    throw new Error('No key selected: pass a title or a key file');
  }
  const keys = config.keys ?? {};
  if (Object.prototype.hasOwnProperty.call(keys, title)) {
    return { title, status: 'external', key: loadKeyFile(keys[title]) };
  }
  return getTitleKey(title);
}

export interface DecryptFileOptions extends KeyOptions {
  outputPath?: string;
  mode?: CryptMode;
  debug?: boolean;
}

export function defaultOutputPath(inputPath: string, mode: CryptMode): string {
  return `${inputPath}${mode === 'decrypt' ? '.dec' : '.enc'}`;
}

/**
 * Decrypts (or re-encrypts) a ROM image file and writes the result.
 * The input file is never modified unless it is also the output path.
 */
export async function decryptRomFile(inputPath: string, options: DecryptFileOptions = {}): Promise<DecryptionReport> {
  const debug = (msg: string) => {
    if (options.debug) console.log(`[DEBUG] ${msg}`);
  };

  const mode = options.mode ?? 'decrypt';
  const config = options.config ?? defaultConfig;
  const resolvedInput = path.resolve(inputPath);
  const outputPath = path.resolve(options.outputPath ?? defaultOutputPath(resolvedInput, mode));

  const source = resolveKey(options);
  debug(`Using key '${source.title}' (${source.status})`);

  const rom = loadRom(resolvedInput);
  debug(`Loaded ${rom.length} words from ${resolvedInput}`);

  const decryptor = new Decryptor(source.key);
  if (mode === 'decrypt') {
    decryptor.decryptRegion(rom);
  } else {
    decryptor.encryptRegion(rom);
  }

  await saveRom(outputPath, rom);
  debug(`Wrote ${rom.length * 2} bytes to ${outputPath}`);

  const entropy = calculateEntropy(bytesFromWords(rom));
  const findings = analyzeImage({ words: rom.length, entropy, mode }, source, config);

  return {
    inputPath: resolvedInput,
    outputPath,
    title: source.title,
    keyStatus: source.status,
    mode,
    words: rom.length,
    entropy,
    findings,
  };
}
