import { describe, it, expect } from 'vitest';

import { AttributeGroup } from '../attribute-group.js';
import { AttributeItem } from '../attribute-item.js';
import { InvalidPathError } from '../../types/errors.js';
import { Employee, Manager, Person } from '../../../test/fixtures/entities.js';

function countNodes(group: AttributeGroup): { items: number; groups: number } {
  let items = 0;
  let groups = 0;
  for (const item of group.getItems().values()) {
    items += 1;
    if (item.group !== undefined) {
      groups += 1;
      const nested = countNodes(item.group);
      items += nested.items;
      groups += nested.groups;
    }
  }
  return { items, groups };
}

describe('AttributeGroup', () => {
  describe('path resolution', () => {
    it('materialises one item per segment and one group per non-leaf segment', () => {
      const group = new AttributeGroup('summary');
      group.addAttribute('manager.address.city');

      expect(countNodes(group)).toEqual({ items: 3, groups: 2 });
      const manager = group.getGroup('manager');
      const address = group.getGroup('manager.address');
      expect(manager?.name).toBe('manager');
      expect(address?.name).toBe('address');
      expect(group.getItem('manager.address.city')?.group).toBeUndefined();
    });

    it('returns the item it created', () => {
      const group = new AttributeGroup();
      group.addAttribute('lead.name');
      const item = group.resolveItem('lead.name', true);

      expect(item).toBeInstanceOf(AttributeItem);
      expect(group.getItem('lead.name')).toBe(item);
      expect(group.getItem(['lead', 'name'])).toBe(item);
    });

    it('links nested groups back to the items that own them', () => {
      const group = new AttributeGroup();
      group.addAttribute('manager.address.city');
      const managerItem = group.getItem('manager');
      const address = group.getGroup('manager.address');

      expect(group.getGroup('manager')?.owningItem).toBe(managerItem);
      expect(managerItem?.owner).toBe(group);
      expect(address?.attributePath()).toBe('manager.address');
      expect(group.attributePath()).toBe('');
    });

    it('stores a one-element dotted path under its first segment', () => {
      const group = new AttributeGroup();
      group.addAttribute(['manager.address']);

      expect([...group.getItems().keys()]).toEqual(['manager']);
      expect(group.containsAttribute('manager.address')).toBe(true);
    });

    it('does not satisfy a longer path with a childless item', () => {
      const group = new AttributeGroup();
      group.addAttribute('lead');
      expect(group.getItem('lead.name')).toBeUndefined();
    });

    it('validates the path before mutating', () => {
      const group = new AttributeGroup();
      expect(() => group.addAttribute('manager..city')).toThrow(InvalidPathError);
      expect(() => group.addAttribute('manager.')).toThrow(InvalidPathError);
      expect(group.hasItems()).toBe(false);
    });
  });

  describe('containment', () => {
    it('implies every prefix of an added path', () => {
      const group = new AttributeGroup();
      group.addAttribute('a.b.c');

      expect(group.containsAttribute('a.b.c')).toBe(true);
      expect(group.containsAttribute('a.b')).toBe(true);
      expect(group.containsAttribute('a')).toBe(true);
      expect(group.containsAttribute('a.b.c.d')).toBe(false);
      expect(group.containsAttribute('b')).toBe(false);
    });

    it('checks single local names without parsing', () => {
      const group = new AttributeGroup();
      group.addAttribute('manager.address');

      expect(group.containsAttributeLocal('manager')).toBe(true);
      expect(group.containsAttributeLocal('manager.address')).toBe(false);
    });

    it('rejects malformed queries', () => {
      const group = new AttributeGroup();
      expect(() => group.containsAttribute('')).toThrow(InvalidPathError);
      expect(() => group.getGroup(' lead')).toThrow(InvalidPathError);
    });
  });

  describe('inheritance fallback', () => {
    function buildHierarchy(): { base: AttributeGroup; derived: AttributeGroup } {
      const base = new AttributeGroup('person', { type: Person });
      base.addAttribute('name');
      base.addAttribute('address.city');
      const derived = new AttributeGroup('employee', { type: Employee });
      derived.addAttribute('salary');
      base.insertSubclass(derived);
      return { base, derived };
    }

    it('reads through to the super group', () => {
      const { base, derived } = buildHierarchy();

      expect(derived.containsAttribute('name')).toBe(true);
      expect(derived.containsAttribute('address.city')).toBe(true);
      expect(derived.containsAttributeLocal('name')).toBe(true);
      expect(derived.getItem('name')).toBe(base.getItem('name'));
      expect(derived.getGroup('address')).toBe(base.getGroup('address'));
      expect(base.containsAttribute('salary')).toBe(false);
    });

    it('writes locally', () => {
      const { base, derived } = buildHierarchy();
      derived.addAttribute('name');

      expect(derived.getItems().has('name')).toBe(true);
      expect(derived.getItem('name')).not.toBe(base.getItem('name'));
    });

    it('overlays local items on inherited ones', () => {
      const { base, derived } = buildHierarchy();
      derived.addAttribute('name');
      const all = derived.getAllItems();

      expect([...all.keys()]).toEqual(['name', 'address', 'salary']);
      expect(all.get('name')).toBe(derived.getItems().get('name'));
      expect(all.get('address')).toBe(base.getItems().get('address'));
    });

    it('unions attribute names with the super group', () => {
      const { derived } = buildHierarchy();
      expect(derived.allAttributeNames()).toEqual(
        new Set(['name', 'address', 'salary'])
      );
    });

    it('ignores a super group that is the group itself', () => {
      const group = new AttributeGroup();
      group.addAttribute('name');
      group.superGroup = group;
      expect(group.allAttributeNames()).toEqual(new Set(['name']));
    });
  });

  describe('mutation', () => {
    it('installs a passed group as the nested specification', () => {
      const group = new AttributeGroup('team');
      const address = new AttributeGroup('address');
      address.addAttribute('city');
      group.addAttribute('home', address);

      expect(group.getGroup('home')).toBe(address);
      expect(address.owningItem).toBe(group.getItem('home'));
      expect(group.containsAttribute('home.city')).toBe(true);
    });

    it('files typed groups per type and keeps the first as primary', () => {
      const group = new AttributeGroup('team');
      const employee = new AttributeGroup('lead', { type: Employee });
      const manager = new AttributeGroup('lead', { type: Manager });
      group.addAttribute('lead', [employee, manager]);
      const item = group.getItem('lead');

      expect(item?.getGroup()).toBe(employee);
      expect(item?.getGroup(Employee)).toBe(employee);
      expect(item?.getGroup(Manager)).toBe(manager);
      expect(manager.owningItem).toBe(item);
    });

    it('replaces an untyped primary with a typed group', () => {
      const group = new AttributeGroup('team');
      group.addAttribute('lead.name');
      const employee = new AttributeGroup('lead', { type: Employee });
      group.addAttribute('lead', employee);

      expect(group.getGroup('lead')).toBe(employee);
    });

    it('adds key groups for map-valued attributes', () => {
      const group = new AttributeGroup('team');
      const key = new AttributeGroup('offices');
      key.addAttribute('city');
      group.addAttributeKey('offices', key);
      const item = group.getItem('offices');

      expect(item?.getKeyGroup()).toBe(key);
      expect(item?.group).toBeUndefined();
      expect(key.owningItem).toBe(item);
    });

    it('adds several paths at once', () => {
      const group = new AttributeGroup();
      group.setAttributeNames(['name', 'lead.name']);
      group.addAttributes(['lead.address']);

      expect(group.allAttributeNames()).toEqual(new Set(['name', 'lead']));
      expect(group.getGroup('lead')?.allAttributeNames()).toEqual(
        new Set(['name', 'address'])
      );
    });

    it('removes the leaf of a path', () => {
      const group = new AttributeGroup();
      group.addAttribute('manager.address.city');
      group.addAttribute('manager.name');
      group.removeAttribute('manager.address');

      expect(group.containsAttribute('manager.address')).toBe(false);
      expect(group.containsAttribute('manager.name')).toBe(true);
    });

    it('ignores removal of an unknown attribute', () => {
      const group = new AttributeGroup();
      group.addAttribute('name');
      group.removeAttribute('missing');
      expect(group.allAttributeNames()).toEqual(new Set(['name']));
    });
  });

  describe('equality', () => {
    it('compares structure, not names or types', () => {
      const a = new AttributeGroup('a', { type: Person });
      a.addAttribute('name');
      a.addAttribute('address.city');
      const b = new AttributeGroup('b');
      b.addAttribute('name');
      b.addAttribute('address.city');

      expect(a.equals(b)).toBe(true);
      b.addAttribute('address.zip');
      expect(a.equals(b)).toBe(false);
    });

    it('includes the super-group chain', () => {
      const base = new AttributeGroup();
      base.addAttribute('name');
      const a = new AttributeGroup();
      const b = new AttributeGroup();
      base.insertSubclass(a);

      expect(a.equals(b)).toBe(false);
      expect(b.equals(a)).toBe(false);
    });

    it('compares items by name and nested structure', () => {
      const a = new AttributeGroup();
      a.addAttribute('lead.name');
      const b = new AttributeGroup();
      b.addAttribute('lead.name');
      b.addAttribute('owner.name');

      expect(a.getItem('lead')?.equals(b.getItem('lead'))).toBe(true);
      expect(a.getItem('lead')?.equals(b.getItem('owner'))).toBe(false);
      expect(a.getItem('lead')?.equals('lead')).toBe(false);
    });

    it('is false for other values', () => {
      expect(new AttributeGroup().equals('group')).toBe(false);
      expect(new AttributeGroup().equals(undefined)).toBe(false);
    });

    it('terminates on self-nested groups', () => {
      const a = new AttributeGroup('a');
      a.addAttribute('next', a);
      const b = new AttributeGroup('b');
      b.addAttribute('next', b);

      expect(a.equals(b)).toBe(true);
    });
  });

  describe('rendering', () => {
    it('renders nested items', () => {
      const group = new AttributeGroup('summary');
      group.addAttribute('firstName');
      group.addAttribute('manager.address.city');

      expect(group.toString()).toBe(
        'AttributeGroup(summary){firstName, manager{address{city}}}'
      );
    });

    it('renders per-type groups other than the primary', () => {
      const group = new AttributeGroup('team');
      const employee = new AttributeGroup('lead', { type: Employee });
      employee.addAttribute('salary');
      const manager = new AttributeGroup('lead', { type: Manager });
      manager.addAttribute('reports');
      group.addAttribute('lead', [employee, manager]);

      expect(group.toString()).toBe(
        'AttributeGroup(team){lead{salary} as Manager{reports}}'
      );
      expect(group.getItem('lead')?.toString()).toBe(
        'AttributeItem(lead)lead{salary} as Manager{reports}'
      );
    });

    it('appends inherited items', () => {
      const base = new AttributeGroup('person');
      base.addAttribute('name');
      const derived = new AttributeGroup('employee');
      derived.addAttribute('salary');
      base.insertSubclass(derived);

      expect(derived.toString()).toBe('AttributeGroup(employee){salary, name}');
    });

    it('stops at a group met again', () => {
      const group = new AttributeGroup('loop');
      group.addAttribute('self', group);
      expect(group.toString()).toBe('AttributeGroup(loop){self{...}}');
    });

    it('labels specialized groups', () => {
      const group = new AttributeGroup('summary');
      group.addAttribute('name');
      const fetch = group.toFetchGroup();
      fetch.variant.shouldLoadAll = true;

      expect(fetch.toString()).toBe('FetchGroup(summary)[loadAll]{name}');
      expect(group.toLoadGroup().toString()).toBe('LoadGroup(summary){name}');
      expect(group.toCopyGroup().toString()).toBe(
        'CopyGroup(summary)[cascade=tree]{name}'
      );
    });
  });

  describe('variants', () => {
    it('is concurrent only as a load group', () => {
      const group = new AttributeGroup();
      expect(group.kind).toBe('generic');
      expect(group.isConcurrent()).toBe(false);
      expect(group.toFetchGroup().isConcurrent()).toBe(false);
      expect(group.toLoadGroup().isConcurrent()).toBe(true);
    });

    it('creates nested groups of its own kind', () => {
      const fetch = new AttributeGroup('summary').toFetchGroup();
      fetch.addAttribute('lead.name');
      expect(fetch.getGroup('lead')?.isFetchGroup()).toBe(true);
    });
  });
});
