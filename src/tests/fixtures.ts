import { defineSchema, field, t } from '../index';

/**
 * A leaf schema with one required field.
 */
export const Address = defineSchema({
  name: 'Address',
  fields: {
    street: field(t.string()),
    city: field(t.string()).required()
  }
});

/**
 * A schema exercising every accessor kind: required and plain getters,
 * a renamed key, collections, a nested schema, a self reference, metadata and
 * a default-bodied accessor.
 */
export const Person = defineSchema({
  name: 'Person',
  fields: {
    name: field(t.string()).required(),
    age: field(t.optional(t.integer())),
    email: field(t.string()).key(':email-address'),
    tags: field(t.set(t.string())),
    scores: field(t.list(t.integer())),
    ratings: field(t.map(t.string(), t.number())),
    born: field(t.instant()),
    address: field(t.schema(Address)),
    manager: field(t.self())
  },
  metadata: {
    source: t.string()
  }
}).withDefaults({
  greeting: (self, punctuation: string) => `Hello, ${self.name()}${punctuation}`
});

/**
 * One required and one optional field.
 */
export const Account = defineSchema({
  name: 'Account',
  fields: {
    id: field(t.string()).required(),
    age: field(t.optional(t.integer()))
  }
});

/**
 * Holds a nested {@link Account}.
 */
export const Order = defineSchema({
  name: 'Order',
  fields: {
    account: field(t.schema(Account)),
    items: field(t.list(t.integer())),
    quantities: field(t.map(t.string(), t.integer()))
  }
});
