import type { ObjectId } from 'mongodb';

/**
 * MongoDB document for a page.
 *
 * IDs are stored as ObjectId and exposed as hex strings by the content store,
 * which keeps the engine free of driver types.
 *
 * @example
 * ```typescript
 * const collection = database.getCollection<IPageDocument>('pages');
 * const children = await collection.find({ parentId: rootId }).sort({ position: 1 }).toArray();
 * ```
 */
export interface IPageDocument {
    _id: ObjectId;
    parentId: ObjectId | null;
    title: string;
    slug: string;
    position: number;
    template: string;
    description: string | null;
    keywords: string | null;
    createdAt: Date;
    updatedAt: Date;
}
