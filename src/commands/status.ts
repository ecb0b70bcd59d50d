import pc from 'picocolors';
import { logFileFromConfig, redactionPolicyFromConfig, validateConfig } from '../config/loader.js';
import type { EnvironmentConfig, PromoterContext, StatusOptions } from '../types.js';

function describeEnvironment(ctx: PromoterContext, env: EnvironmentConfig): string {
  if (env.store === 'awssecretsmanager') {
    const role = env.role ? ` as ${env.role}` : '';
    return `${pc.magenta('awssecretsmanager')} ${env.region}${role}`;
  }
  const token = ctx.process.env[env.token_env]?.trim() ? pc.green('set') : pc.red('not set');
  const namespace = env.namespace ? ` (namespace ${env.namespace})` : '';
  return `${pc.magenta('vault')} ${env.url}${namespace}, ${env.token_env} ${token}`;
}

export async function statusCommand(ctx: PromoterContext, options: StatusOptions): Promise<void> {
  const { root } = options;
  const projectRootResult = ctx.config.findProjectRoot(root);

  ctx.logger.log(pc.blue('Promoter Status\n'));

  ctx.logger.log(pc.bold('Config:'));
  if (!projectRootResult) {
    ctx.logger.log(pc.dim('  No promoter.yaml found'));
    return;
  }
  ctx.logger.log(pc.green(`  ${projectRootResult.configPath}`));

  const config = ctx.config.loadConfig(projectRootResult.projectRoot);

  ctx.logger.log(pc.bold('\nEnvironments:'));
  const names = Object.keys(config.environments);
  if (names.length === 0) {
    ctx.logger.log(pc.dim('  (none)'));
  }
  for (const name of names) {
    ctx.logger.log(`  ${pc.cyan(name)}: ${describeEnvironment(ctx, config.environments[name])}`);
  }

  const policy = redactionPolicyFromConfig(config);
  ctx.logger.log(pc.bold('\nRedaction:'));
  ctx.logger.log(`  redact all secrets: ${policy.redactAllSecrets ? 'yes' : 'no'}`);
  ctx.logger.log(`  redact nested JSON: ${policy.redactNestedJson ? 'yes' : 'no'}`);
  ctx.logger.log(`  sensitive keys: ${policy.sensitiveKeyPatterns.join(', ')}`);

  ctx.logger.log(pc.bold('\nOperation log:'));
  ctx.logger.log(`  ${logFileFromConfig(config)}`);

  const problems = validateConfig(config);
  if (problems.length > 0) {
    ctx.logger.log('');
    for (const problem of problems) {
      ctx.logger.warn(problem);
    }
  }
}
