import pc from 'picocolors';
import { splitSecret } from '../engine/split.js';
import { describeLocation } from '../errors.js';
import { createFileOperationLog } from '../lib/oplog.js';
import type { PromoterContext, SplitCommandOptions } from '../types.js';
import { confirmOrExit, openSession, resolveLogFile } from './session.js';

export async function splitCommand(ctx: PromoterContext, options: SplitCommandOptions): Promise<void> {
  const session = openSession(ctx, options);
  const { stores, source, target, policy } = session;

  const preview = await splitSecret(stores, source, target, policy, { dryRun: true });

  ctx.logger.log(pc.bold(`Split ${describeLocation(source)} -> ${describeLocation(target)}`));
  ctx.logger.log(pc.yellow('Keys moving to target:'));
  for (const key of preview.movedKeys) {
    ctx.logger.log(`  ${pc.cyan(key)}`);
  }
  ctx.logger.log(pc.dim('Keys staying in source:'));
  for (const key of preview.retainedKeys) {
    ctx.logger.log(pc.dim(`  ${key}`));
  }

  if (options.dryRun) {
    ctx.logger.log(pc.dim('\nDry run: nothing was written.'));
    return;
  }

  if (!options.approve) {
    await confirmOrExit(ctx, `Move ${preview.movedKeys.length} key(s) to ${describeLocation(target)}?`);
  }

  const log = createFileOperationLog(ctx, resolveLogFile(session, options.logFile));
  const outcome = await splitSecret(stores, source, target, policy, {}, log);
  ctx.logger.log(pc.green(`\nMoved ${outcome.movedKeys.length} key(s) to ${describeLocation(target)}`));
}
