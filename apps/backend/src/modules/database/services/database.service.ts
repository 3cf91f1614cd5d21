import type { Connection } from 'mongoose';
import type { ClientSession, Collection, CreateIndexesOptions, Document, IndexSpecification } from 'mongodb';
import type { IDatabaseService, ILogger } from '@quire/types';

/**
 * Native MongoDB collection access on top of the shared Mongoose connection.
 *
 * Callers ask for collections by logical name. When a prefix is configured it
 * is prepended to every physical name, which lets several deployments share
 * one database.
 *
 * @example
 * ```typescript
 * import mongoose from 'mongoose';
 * const database = new DatabaseService(logger, mongoose.connection, { prefix: 'staging_' });
 * const pages = database.getCollection<IPageDocument>('pages'); // staging_pages
 * ```
 */
export class DatabaseService implements IDatabaseService {
    private readonly collectionPrefix: string;

    /**
     * @param logger - Logger for index creation and connection problems
     * @param connection - Mongoose connection; injected so tests can pass a stub
     * @param options.prefix - Optional prefix for all collection names
     */
    constructor(
        private readonly logger: ILogger,
        private readonly connection: Connection,
        options?: { prefix?: string }
    ) {
        this.collectionPrefix = options?.prefix ?? '';
    }

    /**
     * Map a logical collection name to its physical name.
     *
     * @throws Error if the name is empty
     */
    getPhysicalCollectionName(logicalName: string): string {
        if (logicalName.length === 0) {
            throw new Error('Collection name must be a non-empty string');
        }

        const sanitized = logicalName.replace(/[^a-zA-Z0-9_-]/g, '_');
        return `${this.collectionPrefix}${sanitized}`;
    }

    /**
     * @throws Error if the MongoDB connection is not established
     */
    getCollection<T extends Document = Document>(name: string): Collection<T> {
        const db = this.connection.db;
        if (!db) {
            throw new Error('MongoDB connection not established');
        }
        // Mongoose bundles its own driver build; the cast bridges the two identical declarations.
        return db.collection<T>(this.getPhysicalCollectionName(name)) as Collection<T>;
    }

    async createIndex(
        collectionName: string,
        indexSpec: IndexSpecification,
        options?: CreateIndexesOptions
    ): Promise<void> {
        const collection = this.getCollection(collectionName);
        await collection.createIndex(indexSpec, options ?? {});
        this.logger.info(
            { prefix: this.collectionPrefix, collection: collectionName, indexSpec },
            'Created collection index'
        );
    }

    /**
     * Run `work` in a transaction on a fresh session.
     *
     * The driver retries `work` on transient transaction errors, so it must
     * only write through the session. The session is always ended.
     */
    async withTransaction<T>(work: (session: ClientSession) => Promise<T>): Promise<T> {
        // Same bridge as getCollection: the session comes from Mongoose's driver build.
        const session = (await this.connection.startSession()) as ClientSession;
        const results: T[] = [];

        try {
            await session.withTransaction(async () => {
                results.length = 0;
                results.push(await work(session));
            });
        } catch (error) {
            this.logger.error({ error }, 'Transaction failed and was rolled back');
            throw error;
        } finally {
            await session.endSession();
        }

        if (results.length === 0) {
            throw new Error('Transaction finished without running its work');
        }
        return results[0];
    }
}
