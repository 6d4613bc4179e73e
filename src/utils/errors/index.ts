export * from './ConstraintViolationError';
export * from './InvalidInputError';
export * from './MalformedInputError';
export * from './SchemaError';
