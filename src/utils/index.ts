export * from './errors';
export * from './logger';

export * from './DateFormatter';
export * from './NumberConversion';
export * from './ResultUtils';
