/**
 * Database document shapes for the pages module.
 */
export type { IPageDocument } from './IPageDocument.js';
export type { IComponentDocument } from './IComponentDocument.js';
export type { ISnapshotDocument } from './ISnapshotDocument.js';
