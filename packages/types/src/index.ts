/**
 * Shared type contracts for the Quire backend.
 *
 * Type-only: importing this package never pulls code into the runtime.
 */

export type * from './pages/index.js';
export type * from './components/index.js';
export type * from './versions/index.js';
export type * from './content-store/index.js';
export type * from './logging/index.js';
export type * from './database/index.js';
export type * from './module/index.js';
