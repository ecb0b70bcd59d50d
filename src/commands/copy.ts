import pc from 'picocolors';
import { copySecret } from '../engine/copy.js';
import { describeLocation } from '../errors.js';
import { createFileOperationLog } from '../lib/oplog.js';
import type { CopyCommandOptions, CopyOptions, CopyOutcome, PromoterContext } from '../types.js';
import { confirmOrExit, openSession, resolveLogFile } from './session.js';

function printKeys(ctx: PromoterContext, outcome: CopyOutcome): void {
  const keys = Object.entries(outcome.keys);
  if (keys.length === 0) {
    ctx.logger.log(pc.dim('  (no keys)'));
    return;
  }
  for (const [key, value] of keys) {
    ctx.logger.log(`  ${pc.cyan(key)}: ${value}`);
  }
}

export async function copyCommand(ctx: PromoterContext, options: CopyCommandOptions): Promise<void> {
  const session = openSession(ctx, options);
  const { stores, source, target, policy } = session;

  const copyOptions: CopyOptions = {
    overwrite: options.overwrite,
    copyConfigOnly: options.copyConfig,
    copySecretsOnly: options.copySecrets,
    keysOnly: options.onlyCopyKeys,
    prune: options.prune,
  };

  const preview = await copySecret(stores, source, target, policy, { ...copyOptions, dryRun: true });
  ctx.logger.log(pc.bold(`Copy ${describeLocation(source)} -> ${describeLocation(target)}`));
  printKeys(ctx, preview);

  if (options.dryRun) {
    ctx.logger.log(pc.dim(`\n${preview.message}`));
    return;
  }

  if (!options.approve) {
    await confirmOrExit(ctx, `Write ${Object.keys(preview.keys).length} key(s) to ${describeLocation(target)}?`);
  }

  const log = createFileOperationLog(ctx, resolveLogFile(session, options.logFile));
  const outcome = await copySecret(stores, source, target, policy, copyOptions, log);
  ctx.logger.log(pc.green(`\n${outcome.message}`));
}
