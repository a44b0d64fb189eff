import chalk from 'chalk';
import type { Command } from 'commander';
import { z } from 'zod';
import { loadConfig, type AppConfig, type ConfigOverrides } from '../lib/config';
import { LocalStore } from '../lib/db/store';
import { ConfigError, errorCategory, errorMessage } from '../lib/errors';
import { configureLogger, parseLevel } from '../lib/logger';
import type { ReportWarning } from '../lib/report';

// ============================================
// EXIT CODES
// ============================================

export const EXIT_OK = 0;
export const EXIT_ERROR = 1;
export const EXIT_SESSION = 2;
export const EXIT_FATAL = 3;

export function exitCodeFor(error: unknown): number {
  switch (errorCategory(error)) {
    case 'session':
      return EXIT_SESSION;
    case 'fatal':
      return EXIT_FATAL;
    default:
      return EXIT_ERROR;
  }
}

/**
 * Wrap a command action: failures print one diagnostic line and set the exit
 * code for their category.
 */
export function action<A extends unknown[]>(fn: (...args: A) => Promise<void>): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await fn(...args);
    } catch (error) {
      const code = exitCodeFor(error);
      const label = code === EXIT_SESSION ? 'Session error' : code === EXIT_FATAL ? 'Fatal error' : 'Error';
      console.error(`\n${chalk.red(`${label}:`)} ${errorMessage(error)}`);
      process.exitCode = code;
    }
  };
}

// ============================================
// OPTIONS & CONFIG
// ============================================

const GlobalOptionsSchema = z.object({
  db: z.string().optional(),
  logLevel: z.string().optional(),
  logFormat: z.enum(['text', 'json']).optional(),
  endpoint: z.string().optional(),
  apiKey: z.string().optional(),
  profileDir: z.string().optional(),
  headless: z.boolean().optional(),
});

/** Validate commander's option bag against a schema */
export function parseOptions<S extends z.ZodTypeAny>(schema: S, values: unknown): z.output<S> {
  const parsed = schema.safeParse(values);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `--${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid option(s): ${issues}`);
  }
  return parsed.data;
}

/** Configuration for a command, CLI flags over environment */
export function commandConfig(command: Command): AppConfig {
  const globals = parseOptions(GlobalOptionsSchema, command.optsWithGlobals());

  const overrides: ConfigOverrides = {};
  if (globals.db) overrides.ALBUMPORTER_DB_PATH = globals.db;
  if (globals.logLevel) overrides.LOG_LEVEL = globals.logLevel;
  if (globals.logFormat) overrides.LOG_FORMAT = globals.logFormat;
  if (globals.endpoint) overrides.IMMICH_ENDPOINT = globals.endpoint;
  if (globals.apiKey) overrides.IMMICH_API_KEY = globals.apiKey;
  if (globals.profileDir) overrides.GPHOTOS_PROFILE_DIR = globals.profileDir;
  if (globals.headless !== undefined) overrides.GPHOTOS_HEADLESS = String(globals.headless);

  const config = loadConfig(process.env, overrides);
  const level = parseLevel(config.logLevel);
  if (config.logLevel && !level) {
    throw new ConfigError(`Unknown log level "${config.logLevel}" (debug, info, warn, error)`);
  }
  configureLogger({ ...(level ? { level } : {}), format: config.logFormat });
  return config;
}

/** Open the store for the duration of `fn` */
export async function withStore<T>(config: AppConfig, fn: (store: LocalStore) => Promise<T>): Promise<T> {
  const store = await LocalStore.open(config.databasePath);
  try {
    return await fn(store);
  } finally {
    await store.close();
  }
}

/**
 * First SIGINT asks the running job to stop after its current unit, a second
 * one exits at once. Returns the function that removes the handler.
 */
export function onInterrupt(stop: () => void): () => void {
  let interrupts = 0;
  const handler = () => {
    interrupts++;
    if (interrupts === 1) {
      console.log(chalk.yellow('\nStopping after the current unit (Ctrl+C again to abort)...'));
      stop();
      return;
    }
    console.log(chalk.red('\nAborted'));
    process.exit(130);
  };
  process.on('SIGINT', handler);
  return () => {
    process.off('SIGINT', handler);
  };
}

// ============================================
// OUTPUT
// ============================================

const RULE = '══════════════════════════════════════════════════════════════';

export function printHeader(title: string, settings: Array<[string, string | number | boolean]> = []) {
  const padding = Math.max(0, RULE.length - title.length);
  const left = ' '.repeat(Math.floor(padding / 2));
  const right = ' '.repeat(Math.ceil(padding / 2));
  console.log(`
${chalk.bold.cyan(`╔${RULE}╗`)}
${chalk.bold.cyan('║')}${left}${chalk.bold.white(title)}${right}${chalk.bold.cyan('║')}
${chalk.bold.cyan(`╚${RULE}╝`)}
`);

  if (settings.length === 0) return;
  console.log(chalk.dim('Configuration:'));
  for (const [label, value] of settings) {
    const shown = typeof value === 'boolean' ? (value ? chalk.yellow('YES') : chalk.green('NO')) : chalk.yellow(String(value));
    console.log(`  ${chalk.blue('•')} ${label}: ${shown}`);
  }
  console.log('');
}

export interface SummaryLine {
  label: string;
  value: number | string;
  tone?: 'good' | 'bad' | 'warn' | 'info';
}

const TONES = {
  good: { mark: '✓', color: chalk.green },
  bad: { mark: '✗', color: chalk.red },
  warn: { mark: '○', color: chalk.yellow },
  info: { mark: '━', color: chalk.blue },
} as const;

export function printSummary(lines: SummaryLine[], elapsedMs?: number) {
  printHeader('SUMMARY');
  const width = Math.max(...lines.map(line => line.label.length)) + 1;
  for (const line of lines) {
    const tone = TONES[line.tone ?? 'info'];
    console.log(`  ${tone.color(`${tone.mark} ${`${line.label}:`.padEnd(width)}`)}  ${line.value}`);
  }
  if (elapsedMs !== undefined) {
    console.log(`\n  ${chalk.cyan(`⏱ ${'Duration:'.padEnd(width)}`)}  ${formatDuration(elapsedMs)}`);
  }
  console.log('');
}

export function printWarnings(warnings: ReportWarning[]) {
  if (warnings.length === 0) return;
  console.log(chalk.yellow('Warnings:'));
  for (const warning of warnings) {
    console.log(`  ${chalk.yellow('•')} ${warning.type} ${chalk.dim(`(${warning.category})`)} x${warning.count}: ${warning.sample}`);
  }
  console.log('');
}

export function formatDuration(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);

  if (hours > 0) return `${hours}h ${minutes % 60}m ${seconds % 60}s`;
  if (minutes > 0) return `${minutes}m ${seconds % 60}s`;
  return `${seconds}s`;
}

export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

// eslint-disable-next-line no-control-regex
const ANSI = /\x1b\[[0-9;]*m/g;

function visibleLength(text: string): number {
  return text.replace(ANSI, '').length;
}

/** Left-aligned columns sized to their widest cell, colour codes ignored */
export function formatTable(headers: string[], rows: Array<Array<string | number | null>>): string[] {
  const cells = rows.map(row => row.map(cell => (cell === null ? '-' : String(cell))));
  const widths = headers.map((header, i) => Math.max(header.length, ...cells.map(row => visibleLength(row[i] ?? ''))));
  const render = (row: string[]) =>
    row.map((cell, i) => cell + ' '.repeat(Math.max(0, (widths[i] ?? 0) - visibleLength(cell)))).join('  ').trimEnd();
  return [render(headers), render(widths.map(width => '-'.repeat(width))), ...cells.map(render)];
}

export function printTable(headers: string[], rows: Array<Array<string | number | null>>) {
  if (rows.length === 0) {
    console.log(chalk.dim('(none)'));
    return;
  }
  const [head, rule, ...body] = formatTable(headers, rows);
  console.log(chalk.bold(head ?? ''));
  console.log(chalk.dim(rule ?? ''));
  for (const line of body) console.log(line);
}
