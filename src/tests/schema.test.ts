import { Map as ImmutableMap } from 'immutable';
import { describe, expect, test } from 'vitest';

import type { TestScenario } from './types';
import { assertSameValue, resolveScenarioInput } from './test-utils';
import { Account, Person } from './fixtures';
import { validateDefinition, type DefinitionInput } from '../definition-validator';
import { CodecError, SchemaDefinitionError } from '../errors';
import { defineSchema, field, t } from '../index';

describe('defineSchema: declaration checks', () => {
  const scenarios: Array<TestScenario<DefinitionInput, string>> = [
    {
      id: 'Empty Name',
      description: 'The name must be a non-empty string.',
      input: { name: '', fields: {} },
      expected: [
        '[dynamic-record] Invalid schema definition for "<anonymous>".',
        '  - The schema name must be a non-empty string.'
      ].join('\n')
    },
    {
      id: 'Duplicate Keys',
      description: 'Two fields may not write the same map key.',
      input: {
        name: 'Clash',
        fields: {
          first: field(t.string()).key('key'),
          second: field(t.string()).key(':key')
        }
      },
      expected: [
        '[dynamic-record] Invalid schema definition for "Clash".',
        '  - Fields "first" and "second" both map to the key "key".'
      ].join('\n')
    },
    {
      id: 'Builder Clash',
      description: 'Accessor names differing only in case share a builder.',
      input: {
        name: 'Cased',
        fields: {
          name: field(t.string()),
          Name: field(t.string())
        }
      },
      expected: [
        '[dynamic-record] Invalid schema definition for "Cased".',
        '  - Accessor "withName" is defined by both field "name" and field "Name".'
      ].join('\n')
    },
    {
      id: 'Metadata Shadows Field',
      description: 'A metadata entry may not reuse the accessors of a field.',
      input: {
        name: 'Shadowed',
        fields: { source: field(t.string()) },
        metadata: { source: t.string() }
      },
      expected: [
        '[dynamic-record] Invalid schema definition for "Shadowed".',
        '  - Accessor "source" is defined by both field "source" and metadata "source".',
        '  - Accessor "withSource" is defined by both field "source" and metadata "source".'
      ].join('\n')
    },
    {
      id: 'Reserved Metadata',
      description: 'The type tag key cannot be declared as metadata.',
      input: { name: 'Tagged', fields: {}, metadata: { type: t.string() } },
      expected: [
        '[dynamic-record] Invalid schema definition for "Tagged".',
        '  - Metadata "type" is reserved for the schema type tag.'
      ].join('\n')
    },
    {
      id: 'Bare Type',
      description: 'Fields must be wrapped in field(...).',
      input: { name: 'Bare', fields: { id: t.string() } },
      expected: [
        '[dynamic-record] Invalid schema definition for "Bare".',
        '  - Field "id" must be declared with field(...), got object.'
      ].join('\n')
    },
    {
      id: 'Bad Metadata',
      description: 'Metadata entries must be types.',
      input: { name: 'Meta', fields: {}, metadata: { source: 'string' } },
      expected: [
        '[dynamic-record] Invalid schema definition for "Meta".',
        '  - Metadata "source" must be declared with a t.* type, got string.'
      ].join('\n')
    },
    {
      id: 'Fields Not An Object',
      description: 'Fields must be a plain object.',
      input: { name: 'Listed', fields: ['id'] },
      expected: [
        '[dynamic-record] Invalid schema definition for "Listed".',
        '  - "fields" must be a plain object of field declarations.'
      ].join('\n')
    }
  ];

  test.for(scenarios)('[$id] $description', ({ input, expected }) => {
    const definition = resolveScenarioInput(input);
    expect(() => validateDefinition(definition)).toThrow(SchemaDefinitionError);
    expect(() => validateDefinition(definition)).toThrow(expected);
  });

  test('defineSchema runs the checks', () => {
    expect(() => defineSchema({ name: ' ', fields: {} })).toThrow(
      SchemaDefinitionError
    );
  });
});

describe('Schema', () => {
  test('wrap accepts a plain object and converts it deeply', () => {
    const ada = Person.wrap({ name: 'Ada', scores: [1, 2] });

    expect(ada.name()).toBe('Ada');
    expect(ada.scores()?.toArray()).toStrictEqual([1, 2]);
  });

  test('wrap uses an Immutable map as-is', () => {
    const data = ImmutableMap({ name: 'Ada' });

    expect(Person.wrap(data).getMap()).toBe(data);
  });

  test('wrap rejects values that are neither maps nor plain objects', () => {
    expect(() => Reflect.apply(Person.wrap, Person, [Person.empty()])).toThrow(
      '[dynamic-record] Expected a map or a plain object, got Person.'
    );
  });

  test('isInstance recognizes instances of exactly this schema', () => {
    expect(Person.isInstance(Person.empty())).toBe(true);
    expect(Person.isInstance(Account.empty())).toBe(false);
    expect(Person.isInstance(ImmutableMap())).toBe(false);
  });

  test('decode wraps an untagged document', () => {
    const ada = Person.decode('{"name":"Ada","email-address":"ada@example.test"}');

    expect(ada.name()).toBe('Ada');
    expect(ada.email()).toBe('ada@example.test');
  });

  test('decode keeps non-string keys of #map documents in the backing map', () => {
    const person = Person.decode('{"#map":[[1,"one"],["name","Ada"]]}');

    expect(person.name()).toBe('Ada');
    expect(person.getMap().get(1)).toBe('one');
  });

  test('decode rejects a document that is not a map', () => {
    expect(() => Person.decode('[1, 2]')).toThrow(CodecError);
    expect(() => Person.decode('[1, 2]')).toThrow(
      '[dynamic-record] Expected a Person document, got list.'
    );
  });

  test('withDefaults returns a new schema', () => {
    const Greeter = Account.withDefaults({
      describe: self => `Account ${self.id()}`
    });

    const account = Greeter.wrap({ id: 'acc-1' });

    expect(account.describe()).toBe('Account acc-1');
    expect(Greeter).not.toBe(Account);
    expect(Account.isInstance(account)).toBe(false);
  });

  test('empty instances have an empty backing map', () => {
    assertSameValue(Person.empty().getMap(), ImmutableMap());
  });
});
