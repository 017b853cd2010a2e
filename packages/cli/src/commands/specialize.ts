import { Option, type Command } from 'commander';

import type { AttributeGroup } from '@attrgroups/core';
import { loadGroupFile } from '../load.js';

const SPECIALIZE_KINDS = ['fetch', 'load', 'copy'] as const;
export type SpecializeKind = (typeof SPECIALIZE_KINDS)[number];

export function isSpecializeKind(value: unknown): value is SpecializeKind {
  return SPECIALIZE_KINDS.some((kind) => kind === value);
}

export function specializeAs(
  group: AttributeGroup,
  kind: SpecializeKind
): AttributeGroup {
  switch (kind) {
    case 'fetch':
      return group.toFetchGroup();
    case 'load':
      return group.toLoadGroup();
    case 'copy':
      return group.toCopyGroup();
  }
}

export function registerSpecializeCommand(program: Command): void {
  program
    .command('specialize')
    .description('Print a group description specialized for an engine')
    .argument('<file>', 'Group description (JSON file)')
    .addOption(
      new Option('-k, --kind <kind>', 'Target kind')
        .choices([...SPECIALIZE_KINDS])
        .makeOptionMandatory()
    )
    .action((file: string, options: { kind: string }) => {
      if (!isSpecializeKind(options.kind)) {
        throw new Error(`Unsupported kind: ${options.kind}`);
      }
      const specialized = specializeAs(loadGroupFile(file), options.kind);
      process.stdout.write(`${specialized.toString()}\n`);
    });
}
