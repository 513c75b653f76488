import Table from 'cli-table3';
import { DecryptionReport, Severity } from '../types';

type Paint = (text: string) => string;

export interface Palette {
  red: Paint;
  yellow: Paint;
  green: Paint;
  cyan: Paint;
  bold: Paint;
  dim: Paint;
}

export interface BoxOptions {
  padding?: number;
  borderColor?: string;
}

export interface ReporterContext {
  chalk?: Palette;
  boxen?: (text: string, options?: BoxOptions) => string;
}

const plain: Palette = {
  red: (s) => s,
  yellow: (s) => s,
  green: (s) => s,
  cyan: (s) => s,
  bold: (s) => s,
  dim: (s) => s,
};

function severityColor(c: Palette, severity: Severity): Paint {
  switch (severity) {
    case 'critical':
    case 'high':
      return c.red;
    case 'medium':
      return c.yellow;
    default:
      return c.dim;
  }
}

export function report(result: DecryptionReport, context: ReporterContext = {}) {
  const c = context.chalk ?? plain;
  const b = context.boxen ?? ((s: string) => s);

  let output = '';

  if (result.findings.length > 0) {
    output += '\n' + c.bold('Findings:') + '\n';
    result.findings.forEach(({ ruleId, severity, message }) => {
      output += severityColor(c, severity)(`  - [${severity}] ${ruleId}: ${message}`) + '\n';
    });
  }

  const table = new Table({
    head: [c.bold('Title'), c.bold('Key'), c.bold('Mode'), c.bold('Words'), c.bold('Entropy')],
    style: {
      head: [], // colours are applied above
      border: [],
    },
  });
  table.push([
    c.cyan(result.title),
    result.keyStatus,
    result.mode,
    String(result.words),
    result.entropy.toFixed(2),
  ]);
  output += '\n' + table.toString() + '\n';

  const verb = result.mode === 'decrypt' ? 'Decrypted' : 'Encrypted';
  const critical = result.findings.some((f) => f.severity === 'critical');
  const summary = `${verb} ${result.words} words to ${result.outputPath}`;
  output +=
    '\n' +
    (critical
      ? b(c.red(`${summary}\nOutput is not trustworthy.`), { padding: 1, borderColor: 'red' })
      : b(c.green(summary), { padding: 1, borderColor: 'green' })) +
    '\n';

  return output;
}
