import type { KeyValueDocument, RedactionPolicy } from '../types.js';
import { classifyKey } from './redact.js';

export interface Partition {
  sensitive: KeyValueDocument;
  nonSensitive: KeyValueDocument;
  movedKeys: string[];
  retainedKeys: string[];
}

export function partitionDocument(document: KeyValueDocument, policy: RedactionPolicy): Partition {
  const partition: Partition = { sensitive: {}, nonSensitive: {}, movedKeys: [], retainedKeys: [] };

  for (const [key, value] of Object.entries(document)) {
    if (classifyKey(policy, key) === 'secret') {
      partition.sensitive[key] = value;
      partition.movedKeys.push(key);
    } else {
      partition.nonSensitive[key] = value;
      partition.retainedKeys.push(key);
    }
  }

  return partition;
}
