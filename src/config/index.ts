// src/config/index.ts

// Re-export environment variables (validated)
export * from './environment';

// Re-export the PostgreSQL access helpers
export { db } from './database';
