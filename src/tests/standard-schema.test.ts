import { Map as ImmutableMap } from 'immutable';
import { describe, expect, test } from 'vitest';

import type { TestScenario } from './types';
import { expectSync, resolveScenarioInput } from './test-utils';
import { Account, Person } from './fixtures';

describe('~standard.validate', () => {
  test('declares the Standard Schema version and vendor', () => {
    expect(Account['~standard'].version).toBe(1);
    expect(Account['~standard'].vendor).toBe('dynamic-record');
  });

  const accepted: Array<TestScenario<unknown, string>> = [
    {
      id: 'Plain Object',
      description: 'A plain object is converted and validated.',
      input: { id: 'acc-1' },
      expected: 'acc-1'
    },
    {
      id: 'Immutable Map',
      description: 'An Immutable map is wrapped and validated.',
      input: () => ImmutableMap({ id: 'acc-2' }),
      expected: 'acc-2'
    },
    {
      id: 'Instance',
      description: 'An instance of the schema is validated as-is.',
      input: () => Account.wrap({ id: 'acc-3' }),
      expected: 'acc-3'
    }
  ];

  test.for(accepted)('[$id] $description', ({ input, expected }) => {
    const result = expectSync(
      Account['~standard'].validate(resolveScenarioInput(input))
    );

    if (result.issues) throw new Error('Expected a valid result');
    expect(Account.isInstance(result.value)).toBe(true);
    expect(result.value.id()).toBe(expected);
  });

  test('reports every missing field and mismatch as an issue', () => {
    const result = expectSync(Account['~standard'].validate({ age: 'old' }));

    expect(result).toStrictEqual({
      issues: [
        { message: 'Required field is missing.', path: ['id'] },
        { message: 'Expected integer, got string.', path: ['age'] }
      ]
    });
  });

  test('rejects inputs that are not maps', () => {
    const result = expectSync(Account['~standard'].validate(42));

    expect(result).toStrictEqual({
      issues: [
        { message: 'Expected Account, a map or a plain object, got integer.' }
      ]
    });
  });

  test('rejects instances of another schema', () => {
    const result = expectSync(
      Account['~standard'].validate(Person.empty().withName('Ada'))
    );

    expect(result).toStrictEqual({
      issues: [
        { message: 'Expected Account, a map or a plain object, got Person.' }
      ]
    });
  });
});
