#!/usr/bin/env node

/**
 * CLI interface for roman-tools
 */

import { Command } from 'commander';
import {
  CrumbObserver,
  MissingTableDataError,
  UnsupportedMethodError,
  listMethods,
  loadConfigFromEnv,
  parseMethod,
  setDebug,
  type RomanizationConfig,
  type Romanizer,
} from '@roman-tools/core';
import { createRomanizer } from '@roman-tools/data';
import { config } from 'dotenv';

export type CliAction = 'segment' | 'convert' | 'cherry-pick' | 'syllable-count' | 'detect-method' | 'validator';

const ACTION_LABELS: Record<CliAction, string> = {
  segment: 'Segmenting text',
  convert: 'Converting text',
  'cherry-pick': 'Cherry-picking text',
  'syllable-count': 'Counting syllables',
  'detect-method': 'Detecting method',
  validator: 'Validating text',
};

export interface CliOptions {
  method?: string;
  from?: string;
  to?: string;
  perWord?: boolean;
  crumbs?: boolean;
  skipErrors?: boolean;
  reportErrors?: boolean;
  dataDir?: string;
  /** Line writer for crumbs (console.log by default; the command line sends them to stderr) */
  log?: (line: string) => void;
  /** Prebuilt romanizer; its config is used as-is */
  romanizer?: Romanizer;
}

export interface CliIO {
  out: (text: string) => void;
  err: (text: string) => void;
  exit: (code: number) => void;
}

const processIO: CliIO = {
  out: text => process.stdout.write(text + '\n'),
  err: text => process.stderr.write(text + '\n'),
  exit: code => process.exit(code),
};

function requireMethod(value: string | undefined, flag: string): string {
  if (!value) {
    throw new UnsupportedMethodError(`(missing ${flag})`);
  }
  return value;
}

function formatErrors(errors: readonly string[]): string {
  return errors.map(error => `! ${error}`).join('\n');
}

/**
 * Programmatic interface for CLI operations
 * Returns the output string that would be printed to stdout
 */
export function runCli(action: CliAction, text: string, options: CliOptions = {}): string {
  const envConfig = loadConfigFromEnv();
  const settings: RomanizationConfig = {
    crumbs: options.crumbs ?? envConfig.crumbs,
    skipErrors: options.skipErrors ?? envConfig.skipErrors,
    reportErrors: options.reportErrors ?? envConfig.reportErrors,
  };
  const crumbs = settings.crumbs ? new CrumbObserver(options.log) : undefined;
  const romanizer = options.romanizer ?? createRomanizer({ config: settings, observer: crumbs, dataDir: options.dataDir });

  if (crumbs) {
    crumbs.crumb('Start', new Date().toISOString());
    crumbs.crumb('Performing action', ACTION_LABELS[action]);
    const enabled = Object.entries(settings).filter(([, on]) => on).map(([name]) => name);
    if (enabled.length > 0) crumbs.crumb('Configuration', enabled.join(', '));
    crumbs.footer();
  }

  let output: string;
  switch (action) {
    case 'segment': {
      const method = parseMethod(requireMethod(options.method, '--method'));
      output = JSON.stringify(romanizer.segment(text, method));
      break;
    }
    case 'validator': {
      const method = parseMethod(requireMethod(options.method, '--method'));
      output = options.perWord
        ? JSON.stringify(romanizer.validateWords(text, method))
        : String(romanizer.validate(text, method));
      break;
    }
    case 'convert':
    case 'cherry-pick': {
      const from = parseMethod(requireMethod(options.from, '--from'));
      const to = parseMethod(requireMethod(options.to, '--to'));
      const report = action === 'convert'
        ? romanizer.convertWithReport(text, from, to)
        : romanizer.cherryPickWithReport(text, from, to);
      output = report.errors.length > 0 ? `${report.text}\n${formatErrors(report.errors)}` : report.text;
      break;
    }
    case 'syllable-count': {
      const method = parseMethod(requireMethod(options.method, '--method'));
      output = JSON.stringify(romanizer.countSyllables(text, method));
      break;
    }
    case 'detect-method': {
      output = options.perWord
        ? JSON.stringify(romanizer.detectMethodPerWord(text))
        : JSON.stringify(romanizer.detectMethod(text));
      break;
    }
    default: {
      const unknown: never = action;
      throw new Error(`Unknown action: ${String(unknown)}`);
    }
  }

  crumbs?.crumb('End', new Date().toISOString());
  return output;
}

export function formatMethodList(): string {
  const lines = ['Supported romanization methods:'];
  for (const method of listMethods()) {
    lines.push(`  ${method.name} or ${method.shorthand}: ${method.label}`);
  }
  return lines.join('\n');
}

/** Exit code for an error: 2 for usage/data problems, 1 otherwise */
export function exitCodeFor(error: unknown): number {
  return error instanceof UnsupportedMethodError || error instanceof MissingTableDataError ? 2 : 1;
}

interface CommandFlags {
  method?: string;
  from?: string;
  to?: string;
  perWord?: boolean;
  crumbs?: boolean;
  skipErrors?: boolean;
  reportErrors?: boolean;
  dataDir?: string;
  debug?: boolean;
}

export function createProgram(io: CliIO = processIO): Command {
  const program = new Command();
  program
    .name('roman-tools')
    .description('Segment, validate and convert romanized Mandarin (Pinyin, Wade-Giles)')
    .version('0.1.0')
    .option('--list-methods', 'list the supported romanization methods')
    .action(() => {
      if (program.opts<{ listMethods?: boolean }>().listMethods) {
        io.out(formatMethodList());
        return;
      }
      io.out(program.helpInformation());
    });

  const register = (action: CliAction, description: string, configure: (command: Command) => void) => {
    const command = program
      .command(action)
      .description(description)
      .argument('<text>', 'text to process')
      .option('-C, --crumbs', 'print parse trace')
      .option('-S, --skip-errors', 'leave unparseable text as written')
      .option('-R, --report-errors', 'print per-syllable diagnostics')
      .option('--data-dir <path>', 'directory holding the romanization tables')
      .option('--debug', 'print debug output');
    configure(command);
    command.action((text: string) => {
      const flags = command.opts<CommandFlags>();
      if (flags.debug) setDebug(true);
      try {
        io.out(runCli(action, text, {
          method: flags.method,
          from: flags.from,
          to: flags.to,
          perWord: flags.perWord,
          crumbs: flags.crumbs,
          skipErrors: flags.skipErrors,
          reportErrors: flags.reportErrors,
          dataDir: flags.dataDir,
          log: io.err,
        }));
      } catch (error) {
        io.err(`ERROR: ${error instanceof Error ? error.message : String(error)}`);
        io.exit(exitCodeFor(error));
      }
    });
  };

  const withMethod = (command: Command) => command.requiredOption('-m, --method <method>', 'pinyin/py or wade-giles/wg');
  const withPair = (command: Command) => command
    .requiredOption('-f, --from <method>', 'source method')
    .requiredOption('-t, --to <method>', 'target method');
  const withPerWord = (command: Command) => command.option('-w, --per-word', 'report each word separately');

  register('segment', 'Segment text into syllables', withMethod);
  register('convert', 'Convert between romanization methods', withPair);
  register('cherry-pick', 'Convert only the romanized words, leaving other text as written', withPair);
  register('syllable-count', 'Count syllables per word', withMethod);
  register('detect-method', 'Detect which methods the text is valid in', withPerWord);
  register('validator', 'Validate romanized text', command => withPerWord(withMethod(command)));

  return program;
}

function main(): void {
  config();
  createProgram().parse(process.argv);
}

if (import.meta.url === `file://${process.argv[1]}`) {
  main();
}
