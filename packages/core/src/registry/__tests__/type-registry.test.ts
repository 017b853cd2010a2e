import { describe, it, expect } from 'vitest';

import { TypeRegistry, UnknownTypeError, findAttribute } from '../type-registry.js';
import {
  Address,
  Employee,
  Manager,
  Person,
  createRegistry,
} from '../../../test/fixtures/entities.js';

describe('TypeRegistry', () => {
  it('resolves registered names', () => {
    const registry = createRegistry();

    expect(registry.has('Person')).toBe(true);
    expect(registry.resolve('Employee')).toBe(Employee);
    expect(registry.nameOf(Manager)).toBe('Manager');
    expect(() => registry.resolve('Ghost')).toThrow(UnknownTypeError);
  });

  it('registers under an explicit name', () => {
    const registry = new TypeRegistry().register(Person, { name: 'app.Person' });

    expect(registry.resolve('app.Person')).toBe(Person);
    expect(registry.has('Person')).toBe(false);
  });

  it('links descriptors to the nearest registered ancestor', () => {
    const registry = new TypeRegistry().register(Person).register(Manager);
    const manager = registry.describe(Manager);

    expect(manager?.parent?.type).toBe(Person);
    expect(manager?.parent?.parent).toBeUndefined();
    expect(registry.describe(Employee)).toBeUndefined();
  });

  it('checks instances and assignability', () => {
    const registry = createRegistry();
    const person = registry.describe(Person);

    expect(person?.isInstance(new Manager())).toBe(true);
    expect(person?.isInstance(new Address())).toBe(false);
    expect(registry.isAssignableFrom(Person, Manager)).toBe(true);
    expect(registry.isAssignableFrom(Manager, Person)).toBe(false);
  });

  it('finds attributes along the parent chain', () => {
    const registry = createRegistry();
    const manager = registry.describe(Manager);
    if (manager === undefined) throw new Error('fixture');

    expect(findAttribute(manager, 'reports')?.target).toBe(Employee);
    expect(findAttribute(manager, 'address')?.target).toBe(Address);
    expect(findAttribute(manager, 'salary')).toEqual({ name: 'salary' });
    expect(findAttribute(manager, 'agency')).toBeUndefined();
  });
});
