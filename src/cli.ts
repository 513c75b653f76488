import boxen from 'boxen';
import chalk from 'chalk';
import Table from 'cli-table3';
import { Command, CommanderError } from 'commander';
import gradient from 'gradient-string';
import ora from 'ora';

import { decryptRomFile } from './index';
import { loadConfig } from './config';
import { listTitles } from './keys';
import * as jsonReporter from './reporters/json';
import * as textReporter from './reporters/text';
import pkg from '../package.json';

export interface CliIo {
  log: (text: string) => void;
  error: (text: string) => void;
  /** Spinner and banner are only drawn on an interactive terminal. */
  interactive: boolean;
  color: boolean;
}

type CliOptions = {
  output?: string;
  title?: string;
  keyFile?: string;
  encrypt?: boolean;
  config?: string;
  listTitles?: boolean;
  format: string;
  dryRun?: boolean;
  debug?: boolean;
};

const defaultIo: CliIo = {
  log: (text) => console.log(text),
  error: (text) => console.error(text),
  interactive: Boolean(process.stderr.isTTY),
  color: chalk.level > 0,
};

function hintFor(message: string): string | null {
  if (message.includes('Unknown title')) {
    return 'Hint: Run with --list-titles to see the bundled key tables, or pass --key-file.';
  }
  if (message.includes('No key selected')) {
    return 'Hint: Pass --title <title>, --key-file <path>, or set "title" in your igs036 configuration.';
  }
  if (message.includes('odd length')) {
    return 'Hint: Program ROMs are made of 16-bit words; check that the file is complete.';
  }
  if (message.includes('not a 16-bit value') || message.includes('expected 256 entries')) {
    return 'Hint: Key tables need 256 hexadecimal values, one per low address byte.';
  }
  return null;
}

/**
 * Runs the command line and resolves to the process exit code:
 * 0 on success, 1 when a critical finding was raised, 2 on error.
 */
export async function runCli(argv: string[], io: CliIo = defaultIo): Promise<number> {
  const c = new chalk.Instance({ level: io.color ? chalk.level || 1 : 0 });

  const listKeys = (format: string) => {
    const titles = listTitles().map(({ title, status, note }) => ({ title, status, note }));
    if (format === 'json') {
      io.log(JSON.stringify(titles, null, 2));
      return;
    }
    const table = new Table({
      head: [c.bold('Title'), c.bold('Status'), c.bold('Note')],
      style: { head: [], border: [] },
    });
    titles.forEach(({ title, status, note }) => table.push([title, status, note ?? '']));
    io.log(table.toString());
  };

  const execute = async (input: string | undefined, options: CliOptions): Promise<number> => {
    try {
      if (options.format !== 'text' && options.format !== 'json') {
        throw new Error(`Unknown format '${options.format}'. Available: text, json`);
      }

      if (options.listTitles) {
        listKeys(options.format);
        return 0;
      }

      if (!input) {
        throw new Error('No input ROM given');
      }

      if (options.format === 'text' && io.interactive) {
        const sandGradient = gradient(['#F4A460', '#D2691E', '#8B4513']);
        io.log(
          boxen(sandGradient(`IGS036 ROM decrypt v${pkg.version}`), {
            padding: 1,
            borderColor: 'yellow',
          }),
        );
      }

      const config = loadConfig(process.cwd(), options.config);
      const mode = options.encrypt ? 'encrypt' : 'decrypt';
      const spinner =
        options.format === 'text' && io.interactive
          ? ora(`${mode === 'decrypt' ? 'Decrypting' : 'Encrypting'} ${input}...`).start()
          : null;

      const result = await decryptRomFile(input, {
        outputPath: options.output,
        title: options.title,
        keyFile: options.keyFile,
        mode,
        config,
        debug: options.debug,
      }).catch((error: unknown) => {
        spinner?.fail(c.red('Failed.'));
        throw error;
      });
      spinner?.succeed(c.green(`Processed ${result.words} words.`));

      io.log(
        options.format === 'json'
          ? jsonReporter.report(result)
          : textReporter.report(result, { chalk: c, boxen }),
      );

      if (result.findings.some((f) => f.severity === 'critical')) {
        if (options.dryRun) {
          if (options.format === 'text') {
            io.log(c.yellow('[DRY RUN] Critical findings, but exiting with 0.'));
          }
          return 0;
        }
        return 1;
      }
      return 0;
    } catch (error: unknown) {
      const msg = error instanceof Error ? error.message : String(error);
      io.error(c.red(`Error: ${msg}`));
      const hint = hintFor(msg);
      if (hint) {
        io.error(c.dim(hint));
      }
      return 2;
    }
  };

  let exitCode = 0;
  const program = new Command();
  program
    .name('igs036-decrypt')
    .description('Decrypt (or re-encrypt) IGS036 program ROM images.')
    .version(pkg.version)
    .argument('[input]', 'ROM image to process')
    .option('-o, --output <path>', 'Where to write the result (defaults to <input>.dec or <input>.enc)')
    .option('-t, --title <title>', 'Bundled or configured title whose key to use')
    .option('-k, --key-file <path>', 'Key table file (.csv or .json)')
    .option('-e, --encrypt', 'Encrypt instead of decrypt')
    .option('-c, --config <path>', 'Configuration file to use instead of searching the current directory')
    .option('--list-titles', 'List the bundled key tables and exit')
    .option('--format <format>', 'Output format (text, json)', 'text')
    .option('--dry-run', 'Always exit with 0, even when the key is known to be wrong')
    .option('--debug', 'Enable debug logging')
    .exitOverride()
    .configureOutput({
      writeOut: (str) => io.log(str.trimEnd()),
      writeErr: (str) => io.error(str.trimEnd()),
    })
    .action(async (input: string | undefined) => {
      exitCode = await execute(input, program.opts<CliOptions>());
    });

  try {
    await program.parseAsync(argv, { from: 'user' });
  } catch (error: unknown) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? 0 : 2;
    }
    throw error;
  }
  return exitCode;
}
