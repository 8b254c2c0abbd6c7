export * from './diagnostics';
export * from './field-types';
export * from './option';
export * from './schema';
