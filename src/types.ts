export type Bit = 0 | 1;

/** 256 sixteen-bit masks, indexed by the low byte of the word address. */
export type KeyTable = readonly number[];

export type KeyStatus = 'verified' | 'suspect' | 'wrong' | 'external';

export interface KeySource {
  title: string;
  status: KeyStatus;
  note?: string;
  key: KeyTable;
}

export interface TriggerPair {
  mask: number; // applied to address >> 8
  match: number;
}

export interface RotationGroup {
  /** High-address bit positions, highest priority first. */
  positions: readonly [number, number, number, number];
  weight: number;
}

export type Severity = 'low' | 'medium' | 'high' | 'critical';

export interface Finding {
  ruleId: string;
  severity: Severity;
  message: string;
}

export type CryptMode = 'decrypt' | 'encrypt';

export interface DecryptionReport {
  inputPath: string;
  outputPath: string;
  title: string;
  keyStatus: KeyStatus;
  mode: CryptMode;
  words: number;
  entropy: number;
  findings: Finding[];
}
