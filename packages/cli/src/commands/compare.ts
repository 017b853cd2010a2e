import type { Command } from 'commander';

import type { AttributeGroup } from '@attrgroups/core';
import { loadGroupFile } from '../load.js';

export type GroupRelation = 'equal' | 'superset' | 'subset' | 'incomparable';

/** Relation of `a` to `b` by attribute coverage */
export function compareGroups(a: AttributeGroup, b: AttributeGroup): GroupRelation {
  const covers = a.isSupersetOf(b);
  const coveredBy = b.isSupersetOf(a);
  if (covers && coveredBy) return 'equal';
  if (covers) return 'superset';
  if (coveredBy) return 'subset';
  return 'incomparable';
}

export function registerCompareCommand(program: Command): void {
  program
    .command('compare')
    .description('Compare the attribute coverage of two group descriptions')
    .argument('<a>', 'First group description (JSON file)')
    .argument('<b>', 'Second group description (JSON file)')
    .action((aPath: string, bPath: string) => {
      const relation = compareGroups(loadGroupFile(aPath), loadGroupFile(bPath));
      process.stdout.write(`${relation}\n`);
      if (relation === 'incomparable') {
        process.exitCode = 1;
      }
    });
}
