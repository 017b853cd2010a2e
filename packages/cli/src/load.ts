import fs from 'node:fs';
import path from 'node:path';

import { restoreGroup, type AttributeGroup } from '@attrgroups/core';

/** Read and restore a group description file relative to the working directory */
export function loadGroupFile(file: string): AttributeGroup {
  const abs = path.resolve(process.cwd(), file);
  const raw = fs.readFileSync(abs, 'utf8');
  return restoreGroup(raw);
}
