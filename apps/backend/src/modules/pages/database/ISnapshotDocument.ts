import type { ObjectId } from 'mongodb';
import type { IComponentDocument } from './IComponentDocument.js';

/**
 * MongoDB document for a page's published snapshot, stored in
 * `page_snapshots`. The `_id` is the page's ID, so each page has at most one.
 */
export interface ISnapshotDocument {
    _id: ObjectId;
    version: number;
    publishedAt: Date;
    components: IComponentDocument[];
}
