export type { IContentStore, IContentSnapshot } from './IContentStore.js';
