import type { ClientSession, Collection, Document, IndexSpecification, CreateIndexesOptions } from 'mongodb';

/**
 * Database access abstraction over the MongoDB connection.
 *
 * Services ask for native driver collections by logical name instead of
 * importing Mongoose, which keeps them testable and lets the backend apply a
 * collection prefix in one place.
 *
 * @example
 * ```typescript
 * const pages = database.getCollection<IPageDocument>('pages');
 * await pages.find({ parentId: rootId }).toArray();
 * ```
 */
export interface IDatabaseService {
    /**
     * Get a native MongoDB collection by logical name.
     *
     * @throws Error if the connection is not established
     */
    getCollection<T extends Document = Document>(name: string): Collection<T>;

    /**
     * Create an index on a collection. Existing identical indexes are left alone.
     */
    createIndex(collectionName: string, indexSpec: IndexSpecification, options?: CreateIndexesOptions): Promise<void>;

    /**
     * Run `work` inside a MongoDB transaction. Writes made with the given
     * session are committed together when `work` resolves and rolled back when
     * it rejects. Requires a replica set or sharded cluster.
     */
    withTransaction<T>(work: (session: ClientSession) => Promise<T>): Promise<T>;
}
