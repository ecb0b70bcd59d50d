import { isAbsolute, join } from 'node:path';
import pc from 'picocolors';
import {
  getEnvironmentConfig,
  logFileFromConfig,
  redactionPolicyFromConfig,
  validateConfig,
} from '../config/loader.js';
import { PromoterError } from '../errors.js';
import type {
  EnvironmentConfig,
  Location,
  LocationArgs,
  PromoterConfig,
  PromoterContext,
  RedactionPolicy,
  StorePair,
} from '../types.js';

export interface Session {
  root: string;
  config: PromoterConfig;
  policy: RedactionPolicy;
  stores: StorePair;
  source: Location;
  target: Location;
}

export function resolveRoot(ctx: PromoterContext, root: string): string {
  return ctx.config.findProjectRoot(root)?.projectRoot ?? root;
}

export function loadValidConfig(ctx: PromoterContext, root: string): PromoterConfig {
  const config = ctx.config.loadConfig(root);
  const problems = validateConfig(config);
  if (problems.length > 0) {
    throw new PromoterError('INVALID_CONFIG', `Invalid configuration:\n  ${problems.join('\n  ')}`);
  }
  return config;
}

/** The KV engine only means something for Vault; it is dropped elsewhere. */
export function toLocation(args: LocationArgs, env: EnvironmentConfig): Location {
  if (env.store === 'vault') {
    return { environment: args.env, path: args.path, engine: args.engine };
  }
  return { environment: args.env, path: args.path };
}

export function openSession(
  ctx: PromoterContext,
  options: { root: string; source: LocationArgs; target: LocationArgs },
): Session {
  const root = resolveRoot(ctx, options.root);
  const config = loadValidConfig(ctx, root);

  const sourceEnv = getEnvironmentConfig(config, options.source.env);
  const targetEnv = getEnvironmentConfig(config, options.target.env);
  const sourceStore = ctx.stores.createStore(sourceEnv, ctx.process.env);
  const targetStore = options.target.env === options.source.env
    ? sourceStore
    : ctx.stores.createStore(targetEnv, ctx.process.env);

  return {
    root,
    config,
    policy: redactionPolicyFromConfig(config),
    stores: { source: sourceStore, target: targetStore },
    source: toLocation(options.source, sourceEnv),
    target: toLocation(options.target, targetEnv),
  };
}

export function resolveLogFile(session: Session, override?: string): string {
  const file = override ?? logFileFromConfig(session.config);
  return isAbsolute(file) ? file : join(session.root, file);
}

/**
 * Asks before a write. Without a terminal there is nobody to ask, so the
 * process stops with a usage error; a declined prompt exits cleanly.
 */
export async function confirmOrExit(ctx: PromoterContext, message: string): Promise<void> {
  if (!ctx.process.stdin.isTTY) {
    ctx.logger.error('Error: confirmation required but stdin is not a terminal.');
    ctx.logger.error('Pass --approve to proceed without prompting, or --dry-run to preview.');
    ctx.process.exit(2);
  }

  const confirmed = await ctx.prompt.confirm(message);
  if (!confirmed) {
    ctx.logger.log(pc.dim('Aborted. Nothing was written.'));
    ctx.process.exit(0);
  }
}
