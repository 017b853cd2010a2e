import { describe, expect, it } from 'vitest';
import fc from 'fast-check';

import { AttributeGroup } from '../../src/model/attribute-group.js';
import { formatAttributePath } from '../../src/model/path.js';

const numRuns = Number(process.env.FC_NUM_RUNS ?? 100);
const seed = Number(process.env.TEST_SEED ?? 424_242);

const segmentArbitrary = fc.stringMatching(/^[a-z][a-z0-9]{0,4}$/);
const pathArbitrary = fc.array(segmentArbitrary, { minLength: 1, maxLength: 4 });
const pathsArbitrary = fc.array(pathArbitrary, { minLength: 1, maxLength: 8 });

function buildGroup(paths: ReadonlyArray<readonly string[]>): AttributeGroup {
  const group = new AttributeGroup('root');
  for (const path of paths) {
    group.addAttribute(path);
  }
  return group;
}

describe('attribute paths (property-based)', () => {
  it('contains every added path and each of its prefixes', () => {
    const property = fc.property(pathsArbitrary, (paths) => {
      const group = buildGroup(paths);

      for (const path of paths) {
        for (let end = 1; end <= path.length; end += 1) {
          expect(group.containsAttribute(path.slice(0, end))).toBe(true);
        }
        const item = group.getItem(formatAttributePath(path));
        expect(item?.attributeName).toBe(path[path.length - 1]);
      }
    });

    fc.assert(property, { seed, numRuns });
  });

  it('returns the item it materialised', () => {
    const property = fc.property(pathArbitrary, (path) => {
      const group = new AttributeGroup();
      const item = group.resolveItem(path, true);

      expect(item).toBeDefined();
      expect(group.getItem(path)).toBe(item);
    });

    fc.assert(property, { seed, numRuns });
  });

  it('does not contain an extension never added', () => {
    const property = fc.property(
      pathsArbitrary,
      segmentArbitrary,
      (paths, extra) => {
        const group = buildGroup(paths);
        const foreign = extra.toUpperCase();

        for (const path of paths) {
          expect(group.containsAttribute([...path, foreign])).toBe(false);
        }
        expect(group.containsAttribute(foreign)).toBe(false);
      }
    );

    fc.assert(property, { seed, numRuns });
  });

  it('ignores insertion order', () => {
    const property = fc.property(pathsArbitrary, (paths) => {
      const forward = buildGroup(paths);
      const backward = buildGroup([...paths].reverse());

      expect(forward.equals(backward)).toBe(true);
      expect(forward.isSupersetOf(backward)).toBe(true);
      expect(backward.isSupersetOf(forward)).toBe(true);
    });

    fc.assert(property, { seed, numRuns });
  });

  it('clones into an equal, mutually superset tree', () => {
    const property = fc.property(pathsArbitrary, (paths) => {
      const group = buildGroup(paths);
      const copy = group.clone();

      expect(copy).not.toBe(group);
      expect(copy.equals(group)).toBe(true);
      expect(copy.isSupersetOf(group)).toBe(true);
      expect(group.isSupersetOf(copy)).toBe(true);
      expect(copy.toString()).toBe(group.toString());
    });

    fc.assert(property, { seed, numRuns });
  });
});
