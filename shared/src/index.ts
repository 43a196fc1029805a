// Types
export * from './types/index';

// Schemas
export * from './schemas/index';

// Utils
export * from './utils/index';
