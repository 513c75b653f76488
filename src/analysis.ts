import { Igs036Config, defaultConfig } from './config';
import { GUESSED_TRIGGERS, UNVERIFIED_ENABLING_POSITIONS } from './crypto/tables';
import { CryptMode, Finding, KeySource } from './types';

// Smaller images give too noisy an entropy estimate.
export const MIN_ENTROPY_BYTES = 4096;

/** First word address with a bit whose rotation and XOR behaviour is unverified. */
export const UNVERIFIED_ADDRESS = 1 << (8 + Math.min(...UNVERIFIED_ENABLING_POSITIONS));

export interface ImageSummary {
  words: number;
  entropy: number;
  mode: CryptMode;
}

/**
 * Checks a processed image and the key that produced it.
 */
export function analyzeImage(image: ImageSummary, source: KeySource, config: Igs036Config = defaultConfig): Finding[] {
  const findings: Finding[] = [];
  const suppressed = new Set(config.suppressedRules ?? []);
  const threshold = config.entropyThreshold ?? defaultConfig.entropyThreshold ?? 8;

  if (source.status === 'wrong') {
    findings.push({
      ruleId: 'wrong-key',
      severity: 'critical',
      message: `Key table for '${source.title}' is marked wrong. ${source.note ?? ''}`.trim(),
    });
  } else if (source.status === 'suspect') {
    findings.push({
      ruleId: 'suspect-key',
      severity: 'medium',
      message: `Key table for '${source.title}' may contain errors. ${source.note ?? ''}`.trim(),
    });
  }

  if (image.words > UNVERIFIED_ADDRESS) {
    findings.push({
      ruleId: 'unverified-rotation',
      severity: 'medium',
      message:
        `Image extends past word 0x${UNVERIFIED_ADDRESS.toString(16)}; rotation rows ` +
        `${UNVERIFIED_ENABLING_POSITIONS.join(', ')} and trigger ${GUESSED_TRIGGERS.join(', ')} are unverified there`,
    });
  }

  if (image.mode === 'decrypt' && image.words * 2 >= MIN_ENTROPY_BYTES && image.entropy > threshold) {
    findings.push({
      ruleId: 'high-entropy',
      severity: 'high',
      message: `Decrypted image looks random (entropy ${image.entropy.toFixed(2)} bits/byte); the key may not match this ROM`,
    });
  }

  return findings.filter((f) => !suppressed.has(f.ruleId));
}
