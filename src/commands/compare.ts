import { compareSecrets } from '../engine/compare.js';
import { formatComparison, formatComparisonJson } from '../formats/comparison.js';
import type { CompareOptions, PromoterContext } from '../types.js';
import { openSession } from './session.js';

export async function compareCommand(ctx: PromoterContext, options: CompareOptions): Promise<void> {
  const session = openSession(ctx, options);
  const result = await compareSecrets(session.stores, session.source, session.target, session.policy);

  ctx.logger.log(options.json ? formatComparisonJson(result) : formatComparison(result));
}
