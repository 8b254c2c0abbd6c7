import { describe, expect, test } from 'vitest';

import type { TestScenario } from './types';
import { resolveScenarioInput } from './test-utils';
import { Person } from './fixtures';
import { classify } from '../introspector';
import { defineSchema, field, t } from '../index';

describe('classify', () => {
  const descriptor = classify(Person);

  test('is memoized per schema', () => {
    expect(classify(Person)).toBe(descriptor);
  });

  test('lists field accessors in declaration order', () => {
    expect(descriptor.fields.map(entry => entry.name)).toStrictEqual([
      'name',
      'age',
      'email',
      'tags',
      'scores',
      'ratings',
      'born',
      'address',
      'manager'
    ]);
  });

  test('lists the required subset', () => {
    expect(descriptor.required.map(entry => entry.name)).toStrictEqual(['name']);
  });

  test('records the map key written by each builder', () => {
    expect(descriptor.builderKeys.get('withName')).toBe('name');
    expect(descriptor.builderKeys.get('withEmail')).toBe('email-address');
    expect(descriptor.fieldsByKey.get('email-address')?.name).toBe('email');
  });

  const scenarios: Array<TestScenario<string, string | undefined>> = [
    {
      id: 'Getter',
      description: 'Field names are getters.',
      input: 'name',
      expected: 'getter'
    },
    {
      id: 'Builder',
      description: 'with-prefixed field names are builders.',
      input: 'withAge',
      expected: 'builder'
    },
    {
      id: 'Metadata Getter',
      description: 'Metadata names are metadata getters.',
      input: 'source',
      expected: 'metadataGetter'
    },
    {
      id: 'Metadata Builder',
      description: 'with-prefixed metadata names are metadata builders.',
      input: 'withSource',
      expected: 'metadataBuilder'
    },
    {
      id: 'Structural',
      description: 'Framework operations are structural.',
      input: 'subtract',
      expected: 'structural'
    },
    {
      id: 'Default',
      description: 'Default-bodied accessors are defaults.',
      input: 'greeting',
      expected: 'default'
    },
    {
      id: 'Unknown',
      description: 'Undeclared names have no shape.',
      input: 'nickname',
      expected: undefined
    }
  ];

  test.for(scenarios)('[$id] $description', ({ input, expected }) => {
    expect(descriptor.methods.get(resolveScenarioInput(input))?.kind).toBe(expected);
  });
});

describe('classify: name collisions', () => {
  const Colliding = defineSchema({
    name: 'Colliding',
    fields: {
      merge: field(t.string()),
      validate: field(t.string())
    }
  }).withDefaults({
    validate: () => 'overridden'
  });

  const descriptor = classify(Colliding);

  test('structural operations win over getters', () => {
    expect(descriptor.methods.get('merge')?.kind).toBe('structural');
  });

  test('defaults win over structural operations', () => {
    expect(descriptor.methods.get('validate')?.kind).toBe('default');
  });

  test('builders of colliding fields stay available', () => {
    expect(descriptor.methods.get('withMerge')?.kind).toBe('builder');
  });
});
