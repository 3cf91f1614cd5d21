/**
 * Database module public API.
 */
export { DatabaseService } from './services/database.service.js';
