// Types
export * from './types/index.js';

// Errors
export * from './errors.js';

// Zod schemas
export * from './schemas/index.js';

// Pure utils (date, money, constants)
export * from './utils/index.js';
