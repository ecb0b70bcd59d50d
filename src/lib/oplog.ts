import type { CopyOutcome, Location, OperationLog, OperationLogEntry, PromoterContext, StoreKind } from '../types.js';

export interface OperationSides {
  source: Location;
  target: Location;
  sourceStore: StoreKind;
  targetStore: StoreKind;
}

function baseEntry(operation: OperationLogEntry['operation'], sides: OperationSides, success: boolean, message: string): OperationLogEntry {
  return {
    timestamp: new Date().toISOString(),
    operation,
    source_env: sides.source.environment,
    source_path: sides.source.path,
    source_store: sides.sourceStore,
    target_env: sides.target.environment,
    target_path: sides.target.path,
    target_store: sides.targetStore,
    success,
    message,
  };
}

/** `outcome.keys` is already rendered; raw sensitive values never reach the log. */
export function copyLogEntry(sides: OperationSides, outcome: Pick<CopyOutcome, 'success' | 'message' | 'keys'>): OperationLogEntry {
  return { ...baseEntry('copy', sides, outcome.success, outcome.message), keys: outcome.keys };
}

export function splitLogEntry(sides: OperationSides, success: boolean, message: string, splitKeys: string[]): OperationLogEntry {
  return { ...baseEntry('split', sides, success, message), split_keys: splitKeys };
}

/** Appends one JSON object per line. */
export function createFileOperationLog(ctx: Pick<PromoterContext, 'fs'>, logFile: string): OperationLog {
  return {
    record(entry) {
      ctx.fs.appendFileSync(logFile, JSON.stringify(entry) + '\n');
    },
  };
}

/** Collects entries in memory; used when the caller wants to inspect them. */
export function createMemoryOperationLog(): OperationLog & { entries: OperationLogEntry[] } {
  const entries: OperationLogEntry[] = [];
  return {
    entries,
    record(entry) {
      entries.push(entry);
    },
  };
}
