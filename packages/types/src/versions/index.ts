export type { IPublishedSnapshot, IDraftStatus } from './IPublishedSnapshot.js';
export type { IVersionService } from './IVersionService.js';
