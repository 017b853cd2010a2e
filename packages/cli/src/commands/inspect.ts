import type { Command } from 'commander';

import type { AttributeGroup } from '@attrgroups/core';
import { loadGroupFile } from '../load.js';

/**
 * Every attribute path reachable through the group's value groups, sorted.
 * Inherited attributes are included; per-type groups contribute their
 * attributes under the same prefix.
 */
export function listAttributePaths(group: AttributeGroup): string[] {
  const paths = new Set<string>();
  collectPaths(group, '', new Set(), paths);
  return [...paths].sort();
}

function collectPaths(
  group: AttributeGroup,
  prefix: string,
  onPath: Set<AttributeGroup>,
  paths: Set<string>
): void {
  if (onPath.has(group)) return;
  onPath.add(group);
  for (const [attributeName, item] of group.getAllItems()) {
    const path = prefix + attributeName;
    paths.add(path);
    const nested = new Set(item.typeGroups?.values() ?? []);
    if (item.group !== undefined) nested.add(item.group);
    for (const child of nested) {
      collectPaths(child, `${path}.`, onPath, paths);
    }
  }
  onPath.delete(group);
}

export function registerInspectCommand(program: Command): void {
  program
    .command('inspect')
    .description('List the attribute paths of a group description')
    .argument('<file>', 'Group description (JSON file)')
    .action((file: string) => {
      const group = loadGroupFile(file);
      const paths = listAttributePaths(group);
      if (paths.length > 0) {
        process.stdout.write(paths.join('\n') + '\n');
      }
    });
}
