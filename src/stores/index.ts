import { resolveVaultToken } from '../config/loader.js';
import type { EnvironmentConfig, SecretStore } from '../types.js';
import { AwsSecretsManagerStore } from './aws.js';
import { VaultStore } from './vault.js';

export { AwsSecretsManagerStore, VaultStore };

/** Builds one adapter per environment; each invocation gets fresh handles. */
export function createStore(config: EnvironmentConfig, env: NodeJS.ProcessEnv): SecretStore {
  switch (config.store) {
    case 'vault':
      return new VaultStore({
        address: config.url,
        token: resolveVaultToken(config, env),
        namespace: config.namespace,
      });
    case 'awssecretsmanager':
      return new AwsSecretsManagerStore({ region: config.region, role: config.role });
  }
}
