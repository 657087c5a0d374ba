import minimist from 'minimist';
import { config as loadDotenv } from 'dotenv';
import { statSync } from 'fs';
import { resolve } from 'path';
import type { ReconcileConfig } from '../types.js';
import { UsageError } from '../core/exitStatus.js';

export interface RawEnv {
  RECONCILE_LOG_FILE?: string;
  RECONCILE_EXCLUDE?: string;
  EXIFTOOL_PATH?: string;
  DEBUG?: string;
}

export interface CliFlags {
  positionals: string[];
  dryRun: boolean;
  extensions: boolean;
  embed: boolean;
  exclude?: string;
  logFile?: string;
  report?: string;
  exiftool?: string;
  debug: boolean;
  help: boolean;
  unknown: string[];
}

export const DEFAULT_EXCLUDE = 'edited';

const STRING_FLAGS = ['exclude', 'log-file', 'report', 'exiftool'];
const BOOLEAN_FLAGS = ['dry-run', 'extensions', 'embed', 'skip-extensions', 'skip-embed', 'debug', 'help'];

function nonEmpty(value: unknown): string | undefined {
  return typeof value === 'string' && value !== '' ? value : undefined;
}

/**
 * Load `.env` from the working directory, if there is one.
 */
export function loadEnvironment(): RawEnv {
  loadDotenv();
  return readEnv(process.env);
}

export function readEnv(source: NodeJS.ProcessEnv): RawEnv {
  return {
    RECONCILE_LOG_FILE: source.RECONCILE_LOG_FILE,
    RECONCILE_EXCLUDE: source.RECONCILE_EXCLUDE,
    EXIFTOOL_PATH: source.EXIFTOOL_PATH,
    DEBUG: source.DEBUG
  };
}

export function parseArgs(argv: string[]): CliFlags {
  const unknown: string[] = [];
  const args = minimist(argv, {
    string: ['_', ...STRING_FLAGS],
    boolean: BOOLEAN_FLAGS,
    default: { extensions: true, embed: true },
    alias: {
      n: 'dry-run',
      d: 'debug',
      h: 'help'
    },
    unknown: arg => {
      if (arg.startsWith('-')) {
        unknown.push(arg);
        return false;
      }
      return true;
    }
  });

  return {
    positionals: args._.map(String),
    dryRun: args['dry-run'] === true,
    extensions: args.extensions !== false && args['skip-extensions'] !== true,
    embed: args.embed !== false && args['skip-embed'] !== true,
    // An explicit empty value means "exclude nothing".
    exclude: typeof args.exclude === 'string' ? args.exclude : undefined,
    logFile: nonEmpty(args['log-file']),
    report: nonEmpty(args.report),
    exiftool: nonEmpty(args.exiftool),
    debug: args.debug === true,
    help: args.help === true,
    unknown
  };
}

export function assertTargetDirectory(dir: string): void {
  let isDirectory = false;
  try {
    isDirectory = statSync(dir).isDirectory();
  } catch {
    throw new UsageError(`Target directory not found: ${dir}`);
  }
  if (!isDirectory) {
    throw new UsageError(`Target is not a directory: ${dir}`);
  }
}

function resolveTarget(positionals: string[], cwd: string): string {
  if (positionals.length === 0) {
    throw new UsageError('Missing target directory');
  }
  if (positionals.length > 1) {
    throw new UsageError(`Expected one target directory, got ${positionals.length}: ${positionals.join(' ')}`);
  }
  return resolve(cwd, positionals[0]);
}

export function buildConfig(env: RawEnv, flags: CliFlags, cwd: string = process.cwd()): ReconcileConfig {
  if (flags.unknown.length > 0) {
    throw new UsageError(`Unknown option(s): ${flags.unknown.join(', ')}`);
  }

  const rootDir = resolveTarget(flags.positionals, cwd);
  assertTargetDirectory(rootDir);

  const logFile = flags.logFile ?? nonEmpty(env.RECONCILE_LOG_FILE);
  return {
    rootDir,
    dryRun: flags.dryRun,
    correctExtensions: flags.extensions,
    embedMetadata: flags.embed,
    excludeSubstring: flags.exclude ?? env.RECONCILE_EXCLUDE ?? DEFAULT_EXCLUDE,
    exiftoolPath: flags.exiftool ?? nonEmpty(env.EXIFTOOL_PATH) ?? 'exiftool',
    logFile: logFile ? resolve(cwd, logFile) : undefined,
    reportFile: flags.report ? resolve(cwd, flags.report) : undefined,
    debug: flags.debug || !!env.DEBUG
  };
}
