import { Map as ImmutableMap } from 'immutable';
import { describe, expect, test } from 'vitest';

import type { TestScenario } from './types';
import { resolveScenarioInput } from './test-utils';
import { Account, Address, Order, Person } from './fixtures';
import { ValidationFailedError } from '../errors';
import { defineSchema, field, t } from '../index';
import type { FieldMismatch } from '../types';

type ValidationOutcome =
  | { valid: true }
  | {
      valid: false;
      missing: readonly string[];
      mismatches: readonly FieldMismatch[];
    };

/**
 * Runs `validate()` and captures its outcome.
 */
function outcomeOf(instance: { validate(): unknown }): ValidationOutcome {
  try {
    instance.validate();
    return { valid: true };
  } catch (error) {
    if (!(error instanceof ValidationFailedError)) throw error;
    return {
      valid: false,
      missing: error.missing,
      mismatches: error.mismatches
    };
  }
}

describe('validate: required and optional fields', () => {
  const scenarios: Array<
    TestScenario<() => { validate(): unknown }, ValidationOutcome>
  > = [
    {
      id: 'Missing Required',
      description: 'A missing required field is reported by name.',
      input: () => () => Account.wrap({ age: 3 }),
      expected: { valid: false, missing: ['id'], mismatches: [] }
    },
    {
      id: 'Wrong Optional Shape',
      description: 'A present optional value of the wrong shape is a mismatch.',
      input: () => () => Account.wrap({ id: 'acc-1', age: 'old' }),
      expected: {
        valid: false,
        missing: [],
        mismatches: [
          { field: 'age', path: [], expected: 'integer', actual: 'string' }
        ]
      }
    },
    {
      id: 'Absent Optional',
      description: 'An absent optional field with the required field present is valid.',
      input: () => () => Account.wrap({ id: 'acc-1' }),
      expected: { valid: true }
    },
    {
      id: 'Everything Reported',
      description: 'Missing fields and mismatches are reported together.',
      input: () => () => Account.wrap({ age: 1.5 }),
      expected: {
        valid: false,
        missing: ['id'],
        mismatches: [
          { field: 'age', path: [], expected: 'integer', actual: 'number' }
        ]
      }
    },
    {
      id: 'Wrong Required Shape',
      description: 'A present required value of the wrong shape is a mismatch, not missing.',
      input: () => () => Account.wrap({ id: 7 }),
      expected: {
        valid: false,
        missing: [],
        mismatches: [
          { field: 'id', path: [], expected: 'string', actual: 'integer' }
        ]
      }
    }
  ];

  test.for(scenarios)('[$id] $description', ({ input, expected }) => {
    const build = resolveScenarioInput(input);
    expect(outcomeOf(build())).toStrictEqual(expected);
  });
});

describe('validate: nested instances and collections', () => {
  const scenarios: Array<
    TestScenario<() => { validate(): unknown }, ValidationOutcome>
  > = [
    {
      id: 'Invalid Nested Instance',
      description:
        'A nested instance missing its own required field is a mismatch on the outer field.',
      input: () => () => Order.wrap({ account: { age: 1 } }),
      expected: {
        valid: false,
        missing: [],
        mismatches: [
          {
            field: 'account',
            path: [],
            expected: 'Account',
            actual: 'Account (invalid: missing id)'
          }
        ]
      }
    },
    {
      id: 'Valid Nested Instance',
      description: 'A valid nested instance passes.',
      input: () => () => Order.wrap({ account: { id: 'acc-1' } }),
      expected: { valid: true }
    },
    {
      id: 'Nested Instance Of Another Schema',
      description: 'An instance of a different schema is a mismatch naming that schema.',
      input: () => () =>
        Order.wrap(ImmutableMap({ account: Address.empty().withCity('Oslo') })),
      expected: {
        valid: false,
        missing: [],
        mismatches: [
          { field: 'account', path: [], expected: 'Account', actual: 'Address' }
        ]
      }
    },
    {
      id: 'List Elements',
      description: 'Every bad list element is reported with its index.',
      input: () => () => Order.wrap({ items: [1, 'two', 3, 'four'] }),
      expected: {
        valid: false,
        missing: [],
        mismatches: [
          { field: 'items', path: [1], expected: 'integer', actual: 'string' },
          { field: 'items', path: [3], expected: 'integer', actual: 'string' }
        ]
      }
    },
    {
      id: 'Map Values',
      description: 'Bad map values are reported with their key.',
      input: () => () => Order.wrap({ quantities: { apples: 2, pears: 'many' } }),
      expected: {
        valid: false,
        missing: [],
        mismatches: [
          {
            field: 'quantities',
            path: ['pears'],
            expected: 'integer',
            actual: 'string'
          }
        ]
      }
    },
    {
      id: 'Not A Collection',
      description: 'A scalar where a list is declared is a mismatch on the field.',
      input: () => () => Order.wrap({ items: 'abc' }),
      expected: {
        valid: false,
        missing: [],
        mismatches: [
          { field: 'items', path: [], expected: 'list<integer>', actual: 'string' }
        ]
      }
    }
  ];

  test.for(scenarios)('[$id] $description', ({ input, expected }) => {
    const build = resolveScenarioInput(input);
    expect(outcomeOf(build())).toStrictEqual(expected);
  });
});

class Money {
  constructor(readonly cents: number) {}
}

const Invoice = defineSchema({
  name: 'Invoice',
  fields: {
    total: field(t.instanceOf(Money)),
    customer: field(t.lazy(() => Customer))
  }
});

const Customer = defineSchema({
  name: 'Customer',
  fields: {
    id: field(t.string()).required()
  }
});

describe('validate: class and forward-referenced fields', () => {
  const scenarios: Array<
    TestScenario<() => { validate(): unknown }, ValidationOutcome>
  > = [
    {
      id: 'Class Instance',
      description: 'A value of the declared class passes.',
      input: () => () => Invoice.wrap(ImmutableMap({ total: new Money(250) })),
      expected: { valid: true }
    },
    {
      id: 'Wrong Class',
      description: 'A value that is not of the declared class is a mismatch naming it.',
      input: () => () => Invoice.wrap(ImmutableMap({ total: 250 })),
      expected: {
        valid: false,
        missing: [],
        mismatches: [
          { field: 'total', path: [], expected: 'Money', actual: 'integer' }
        ]
      }
    },
    {
      id: 'Forward Reference',
      description: 'A schema declared later resolves when the field is read.',
      input: () => () => Invoice.wrap({ customer: { id: 'c-1' } }),
      expected: { valid: true }
    },
    {
      id: 'Invalid Forward Reference',
      description: 'A nested instance of a later schema is validated against it.',
      input: () => () => Invoice.wrap({ customer: {} }),
      expected: {
        valid: false,
        missing: [],
        mismatches: [
          {
            field: 'customer',
            path: [],
            expected: 'Customer',
            actual: 'Customer (invalid: missing id)'
          }
        ]
      }
    }
  ];

  test.for(scenarios)('[$id] $description', ({ input, expected }) => {
    const build = resolveScenarioInput(input);
    expect(outcomeOf(build())).toStrictEqual(expected);
  });

  test('the forward-referenced getter returns an instance of the later schema', () => {
    const customer = Invoice.wrap({ customer: { id: 'c-1' } }).customer();

    expect(Customer.isInstance(customer)).toBe(true);
    expect(customer?.id()).toBe('c-1');
  });
});

describe('ValidationFailedError', () => {
  test('validate options limit the listed mismatches', () => {
    const person = Person.wrap({ name: 'Ada', scores: ['a', 'b', 'c'] });

    expect(() => person.validate({ maxPreviewItems: 1 })).toThrow(
      [
        '[dynamic-record] Validation failed for Person.',
        'Mismatched fields:',
        '  scores.0: expected integer, got string',
        '  … (2 more)',
        'Summary: missing=0, mismatched=3'
      ].join('\n')
    );
  });

  test('formats every finding into its message', () => {
    expect(() => Account.wrap({ age: 'old' }).validate()).toThrow(
      [
        '[dynamic-record] Validation failed for Account.',
        'Missing required fields: "id"',
        'Mismatched fields:',
        '  age: expected integer, got string',
        'Summary: missing=1, mismatched=1'
      ].join('\n')
    );
  });

  test('exposes the mismatched fields with their actual shapes', () => {
    try {
      Order.wrap({ items: ['a', 'b'], account: { age: 1 } }).validate();
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationFailedError);
      if (!(error instanceof ValidationFailedError)) return;

      expect(Array.from(error.mismatchedFields)).toStrictEqual([
        ['account', 'Account (invalid: missing id)'],
        ['items', 'string']
      ]);
    }
  });
});
