import type { CompareOptions, CopyCommandOptions, LocationArgs, SplitCommandOptions } from './types.js';

/** A malformed command line; the CLI prints it with the help hint and exits 2. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export interface ParsedArgs {
  command: string;
  positionals: string[];
  root: string;
  sourceKv?: string;
  targetKv?: string;
  targetEnv?: string;
  logTo?: string;
  overwrite: boolean;
  copyConfig: boolean;
  copySecrets: boolean;
  onlyCopyKeys: boolean;
  prune: boolean;
  dryRun: boolean;
  approve: boolean;
  json: boolean;
  help: boolean;
  version: boolean;
}

const BOOLEAN_FLAGS = {
  '--overwrite': 'overwrite',
  '--copy-config': 'copyConfig',
  '--copy-secrets': 'copySecrets',
  '--only-copy-keys': 'onlyCopyKeys',
  '--prune': 'prune',
  '--dry-run': 'dryRun',
  '--approve': 'approve',
  '--json': 'json',
} as const;

function isBooleanFlag(arg: string): arg is keyof typeof BOOLEAN_FLAGS {
  return Object.hasOwn(BOOLEAN_FLAGS, arg);
}

export function parseArgs(args: string[], cwd: string): ParsedArgs {
  const parsed: ParsedArgs = {
    command: '',
    positionals: [],
    root: cwd,
    overwrite: false,
    copyConfig: false,
    copySecrets: false,
    onlyCopyKeys: false,
    prune: false,
    dryRun: false,
    approve: false,
    json: false,
    help: false,
    version: false,
  };

  const valueOf = (flag: string, index: number): string => {
    const value = args[index];
    if (value === undefined || value.startsWith('-')) {
      throw new UsageError(`${flag} requires a value`);
    }
    return value;
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '-h' || arg === '--help') {
      parsed.help = true;
      continue;
    }

    if (arg === '-v' || arg === '--version') {
      parsed.version = true;
      continue;
    }

    if (isBooleanFlag(arg)) {
      parsed[BOOLEAN_FLAGS[arg]] = true;
      continue;
    }

    if (arg === '-r' || arg === '--root') {
      parsed.root = valueOf(arg, ++i);
      continue;
    }

    if (arg === '--source-kv') {
      parsed.sourceKv = valueOf(arg, ++i);
      continue;
    }

    if (arg === '--target-kv') {
      parsed.targetKv = valueOf(arg, ++i);
      continue;
    }

    if (arg === '--target-env') {
      parsed.targetEnv = valueOf(arg, ++i);
      continue;
    }

    if (arg === '--log-to') {
      parsed.logTo = valueOf(arg, ++i);
      continue;
    }

    if (arg.startsWith('-')) {
      throw new UsageError(`Unknown option: ${arg}`);
    }

    if (!parsed.command) {
      parsed.command = arg;
    } else {
      parsed.positionals.push(arg);
    }
  }

  return parsed;
}

/** Flags another command owns are an error, not a silent no-op. */
function rejectFlags(command: string, flags: Record<string, boolean>): void {
  const stray = Object.keys(flags).filter((flag) => flags[flag]);
  if (stray.length > 0) {
    throw new UsageError(`${stray.join(', ')} cannot be used with ${command}`);
  }
}

function sourceArgs(parsed: ParsedArgs, env: string, path: string): LocationArgs {
  return { env, path, engine: parsed.sourceKv };
}

// The target engine falls back to the source engine.
function targetArgs(parsed: ParsedArgs, env: string, path: string): LocationArgs {
  return { env, path, engine: parsed.targetKv ?? parsed.sourceKv };
}

/** `<source-env> <path> <target-env> [target-path]`, shared by compare and copy. */
function crossEnvironmentPair(parsed: ParsedArgs, usage: string): { source: LocationArgs; target: LocationArgs } {
  const [sourceEnv, sourcePath, targetEnv, targetPath] = parsed.positionals;
  if (!sourceEnv || !sourcePath || !targetEnv || parsed.positionals.length > 4) {
    throw new UsageError(`Usage: ${usage}`);
  }
  return {
    source: sourceArgs(parsed, sourceEnv, sourcePath),
    target: targetArgs(parsed, targetEnv, targetPath ?? sourcePath),
  };
}

export function compareOptionsFrom(parsed: ParsedArgs): CompareOptions {
  rejectFlags('compare', { '--target-env': parsed.targetEnv !== undefined });
  const pair = crossEnvironmentPair(parsed, 'promoter compare <source-env> <path> <target-env> [target-path]');
  return { root: parsed.root, ...pair, json: parsed.json };
}

export function copyOptionsFrom(parsed: ParsedArgs): CopyCommandOptions {
  rejectFlags('copy', { '--target-env': parsed.targetEnv !== undefined, '--json': parsed.json });
  const pair = crossEnvironmentPair(parsed, 'promoter copy <source-env> <path> <target-env> [target-path]');
  return {
    root: parsed.root,
    ...pair,
    overwrite: parsed.overwrite,
    copyConfig: parsed.copyConfig,
    copySecrets: parsed.copySecrets,
    onlyCopyKeys: parsed.onlyCopyKeys,
    prune: parsed.prune,
    dryRun: parsed.dryRun,
    approve: parsed.approve,
    logFile: parsed.logTo,
  };
}

/** `<source-env> <source-path> <target-path>`; the target environment defaults to the source's. */
export function splitOptionsFrom(parsed: ParsedArgs): SplitCommandOptions {
  rejectFlags('split', { '--json': parsed.json });
  const [sourceEnv, sourcePath, targetPath] = parsed.positionals;
  if (!sourceEnv || !sourcePath || !targetPath || parsed.positionals.length > 3) {
    throw new UsageError('Usage: promoter split <source-env> <source-path> <target-path> [--target-env <env>]');
  }
  return {
    root: parsed.root,
    source: sourceArgs(parsed, sourceEnv, sourcePath),
    target: targetArgs(parsed, parsed.targetEnv ?? sourceEnv, targetPath),
    dryRun: parsed.dryRun,
    approve: parsed.approve,
    logFile: parsed.logTo,
  };
}
