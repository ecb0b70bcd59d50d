#!/usr/bin/env node
import { createRequire } from 'node:module';
import pc from 'picocolors';
import { UsageError, compareOptionsFrom, copyOptionsFrom, parseArgs, splitOptionsFrom } from './args.js';
import { defaultContext } from './context.js';
import { compareCommand } from './commands/compare.js';
import { copyCommand } from './commands/copy.js';
import { splitCommand } from './commands/split.js';
import { statusCommand } from './commands/status.js';
import { isPromoterError } from './errors.js';

const require = createRequire(import.meta.url);
const { version: VERSION } = require('../package.json');

function printHelp(): void {
  console.log(`
${pc.bold('promoter')} - compare, copy and split secrets across environments

${pc.bold('Usage:')}
  promoter <command> [options]

${pc.bold('Commands:')}
  compare <src-env> <path> <dst-env> [dst-path]   Show a redacted diff of two documents
  copy <src-env> <path> <dst-env> [dst-path]      Merge keys from one document into another
  split <env> <path> <dst-path>                   Move sensitive keys into a new document
  status                                          Show configuration and token status

${pc.bold('Options:')}
  -r, --root <dir>     Directory to search for promoter.yaml (default: current directory)
  --source-kv <name>   Vault KV engine of the source
  --target-kv <name>   Vault KV engine of the target (default: --source-kv)
  --target-env <env>   Target environment (split only, default: source env)
  --overwrite          Replace keys the target already has (copy only)
  --copy-config        Only copy keys that are not sensitive (copy only)
  --copy-secrets       Only copy sensitive keys (copy only)
  --only-copy-keys     Copy key names with empty values (copy only)
  --prune              Drop target keys the source does not have (copy only)
  --dry-run            Preview without writing (copy/split)
  --approve            Skip the confirmation prompt (copy/split)
  --log-to <file>      Operation log file (default: log_file from config)
  --json               Machine-readable output (compare only)
  -h, --help           Show this help message
  -v, --version        Show version number

${pc.bold('Exit codes:')}
  0  success, or declined at the prompt
  1  operation failed
  2  configuration or usage error
  3  split left both locations holding the moved keys

${pc.bold('Examples:')}
  promoter compare dev app/api prod --source-kv secret
  promoter copy dev app/api staging --source-kv secret --copy-config --dry-run
  promoter copy prod-aws api/config prod-aws api/config-next --prune --approve
  promoter split dev app/api app/api-secrets --source-kv secret
`);
}

function exitCodeFor(error: unknown): number {
  if (error instanceof UsageError) return 2;
  if (isPromoterError(error, 'INVALID_CONFIG') || isPromoterError(error, 'INVALID_LOCATION')) return 2;
  if (isPromoterError(error, 'PARTIAL_FAILURE')) return 3;
  return 1;
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  if (args.length === 0) {
    printHelp();
    process.exit(0);
  }

  try {
    const parsed = parseArgs(args, process.cwd());

    if (parsed.help) {
      printHelp();
      process.exit(0);
    }

    if (parsed.version) {
      console.log(VERSION);
      process.exit(0);
    }

    switch (parsed.command) {
      case 'compare':
        await compareCommand(defaultContext, compareOptionsFrom(parsed));
        break;

      case 'copy':
        await copyCommand(defaultContext, copyOptionsFrom(parsed));
        break;

      case 'split':
        await splitCommand(defaultContext, splitOptionsFrom(parsed));
        break;

      case 'status':
        await statusCommand(defaultContext, { root: parsed.root });
        break;

      default:
        if (parsed.command) {
          console.error(pc.red(`Unknown command: ${parsed.command}`));
        }
        printHelp();
        process.exit(2);
    }
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(pc.red(`Error: ${message}`));
    if (error instanceof UsageError) {
      console.error(pc.dim('Run "promoter --help" for usage.'));
    }
    process.exit(exitCodeFor(error));
  }
}

void main();
