import { DecryptionReport } from '../types';

export function report(result: DecryptionReport) {
  return JSON.stringify(result, null, 2);
}
