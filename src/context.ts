import { createInterface } from 'node:readline';
import pc from 'picocolors';
import { fs } from './lib/fs.js';
import { loadConfig, findProjectRoot } from './config/loader.js';
import { createStore } from './stores/index.js';
import type { PromoterContext } from './types.js';

function confirm(message: string): Promise<boolean> {
  const rl = createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  return new Promise((resolve) => {
    rl.question(`${pc.bold(message)} ${pc.dim('[y/N]')} `, (answer) => {
      rl.close();
      const normalized = answer.trim().toLowerCase();
      resolve(normalized === 'y' || normalized === 'yes');
    });
  });
}

export const defaultContext: PromoterContext = {
  fs,
  logger: {
    log: (message) => console.log(message),
    error: (message) => console.error(pc.red(message)),
    warn: (message) => console.warn(pc.yellow(message)),
    info: (message) => console.info(pc.blue(message)),
  },
  process: {
    cwd: () => process.cwd(),
    exit: (code) => process.exit(code),
    env: process.env,
    stdin: process.stdin,
  },
  config: {
    loadConfig,
    findProjectRoot,
  },
  stores: {
    createStore,
  },
  prompt: {
    confirm,
  },
};
