// -----------------------------------------------------------------------------
// Database schema
// -----------------------------------------------------------------------------

export * from './enums.js';
export * from './users.js';
export * from './stories.js';
export * from './retrieval.js';
