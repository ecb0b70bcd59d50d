import pc from 'picocolors';
import { diffEntries } from '../core/diff.js';
import { describeLocation } from '../errors.js';
import type { ComparisonResult, DiffEntry } from '../types.js';

function indent(value: string, prefix: string): string {
  return value.split('\n').join(`\n${prefix}`);
}

function formatEntry(entry: DiffEntry): string[] {
  switch (entry.status) {
    case 'added':
      return [pc.green(`+ ${entry.key}: ${indent(entry.source, '    ')}`)];
    case 'removed':
      return [pc.red(`- ${entry.key}: ${indent(entry.target, '    ')}`)];
    case 'modified': {
      const lines = [
        pc.yellow(`~ ${entry.key}`),
        `    source: ${indent(entry.source, '      ')}`,
        `    target: ${indent(entry.target, '      ')}`,
      ];
      if (entry.diff) lines.push(pc.dim(`    diff:   ${entry.diff}`));
      return lines;
    }
  }
}

export function formatComparison(result: ComparisonResult): string {
  const lines: string[] = [
    pc.bold(`Comparing ${describeLocation(result.source)} -> ${describeLocation(result.target)}`),
    '',
  ];

  for (const entry of result.entries) {
    if (entry.status === 'info') {
      lines.push(pc.cyan(`i ${entry.message}`));
    } else {
      lines.push(...formatEntry(entry));
    }
  }

  const entries = diffEntries(result);
  if (entries.length === 0) {
    lines.push(pc.green('Documents are in sync'));
    return lines.join('\n');
  }

  const count = (status: DiffEntry['status']) => entries.filter((e) => e.status === status).length;
  lines.push('');
  lines.push(pc.dim(`${count('added')} added, ${count('removed')} removed, ${count('modified')} modified`));
  return lines.join('\n');
}

export function formatComparisonJson(result: ComparisonResult): string {
  return JSON.stringify(result, null, 2);
}
