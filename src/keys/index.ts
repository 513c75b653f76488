import cjddzsp from './data/cjddzsp.json';
import cjdh2 from './data/cjdh2.json';
import ddpdoj from './data/ddpdoj.json';
import kof98umh from './data/kof98umh.json';
import kov2 from './data/kov2.json';
import kov3 from './data/kov3.json';
import m312cn from './data/m312cn.json';
import orleg2 from './data/orleg2.json';
import { KeySource, KeyStatus, KeyTable } from '../types';
import { parseKeyValue } from '../utils/key-file';
import { validateKeyTable } from '../utils/validators';

interface KeyData {
  title: string;
  key: string[];
}

interface TitleEntry {
  data: KeyData;
  status: KeyStatus;
  note?: string;
}

// Most tables were recovered automatically from the XOR structure and few
// errors are expected in them.
const TITLES = new Map<string, TitleEntry>(Object.entries<TitleEntry>({
  cjddzsp: { data: cjddzsp, status: 'verified' },
  cjdh2: { data: cjdh2, status: 'verified' },
  ddpdoj: {
    data: ddpdoj,
    status: 'suspect',
    note: 'Recovered with substantial manual work; more likely than the others to still contain errors.',
  },
  kof98umh: {
    data: kof98umh,
    status: 'wrong',
    note: 'Decrypted output will not be valid program code.',
  },
  kov2: { data: kov2, status: 'verified' },
  kov3: { data: kov3, status: 'verified' },
  m312cn: { data: m312cn, status: 'verified' },
  orleg2: { data: orleg2, status: 'verified' },
}));

const loaded = new Map<string, KeyTable>();

function keyFor(title: string, data: KeyData): KeyTable {
  let key = loaded.get(title);
  if (!key) {
    const values = data.key.map((value, i) => parseKeyValue(value, `${title}.json`, i));
    validateKeyTable(values, `${title}.json`);
    key = Object.freeze(values);
    loaded.set(title, key);
  }
  return key;
}

function titleNames(): string[] {
  return Array.from(TITLES.keys()).sort();
}

export function isKnownTitle(title: string): boolean {
  return TITLES.has(title);
}

export function getTitleKey(title: string): KeySource {
  const entry = TITLES.get(title);
  if (!entry) {
    throw new Error(`Unknown title '${title}'. Available: ${titleNames().join(', ')}`);
  }
  const { data, status, note } = entry;
  return { title, status, note, key: keyFor(title, data) };
}

export function listTitles(): KeySource[] {
  return titleNames()
    .map((title) => getTitleKey(title));
}
