import type {
    IComponent,
    IContentSnapshot,
    IContentStore,
    IDatabaseService,
    ILogger,
    IPageRecord,
    IPublishedSnapshot
} from '@quire/types';
import { ObjectId, type AnyBulkWriteOperation, type ClientSession, type WithoutId } from 'mongodb';
import type { IComponentDocument, IPageDocument, ISnapshotDocument } from '../../database/index.js';

export const PAGES_COLLECTION = 'pages';
export const COMPONENTS_COLLECTION = 'page_components';
export const SNAPSHOTS_COLLECTION = 'page_snapshots';

function toPageDocument(page: IPageRecord): WithoutId<IPageDocument> {
    return {
        parentId: page.parentId === null ? null : new ObjectId(page.parentId),
        title: page.title,
        slug: page.slug,
        position: page.position,
        template: page.template,
        description: page.description,
        keywords: page.keywords,
        createdAt: page.createdAt,
        updatedAt: page.updatedAt
    };
}

function fromPageDocument(doc: IPageDocument): IPageRecord {
    return {
        _id: doc._id.toString(),
        parentId: doc.parentId === null ? null : doc.parentId.toString(),
        title: doc.title,
        slug: doc.slug,
        position: doc.position,
        template: doc.template,
        description: doc.description ?? null,
        keywords: doc.keywords ?? null,
        createdAt: doc.createdAt,
        updatedAt: doc.updatedAt
    };
}

function toComponentDocument(component: IComponent): IComponentDocument {
    return {
        _id: new ObjectId(component._id),
        pageId: new ObjectId(component.pageId),
        position: component.position,
        componentType: component.componentType,
        title: component.title,
        body: component.body,
        template: component.template,
        createdAt: component.createdAt,
        updatedAt: component.updatedAt
    };
}

function fromComponentDocument(doc: IComponentDocument): IComponent {
    return {
        _id: doc._id.toString(),
        pageId: doc.pageId.toString(),
        position: doc.position,
        componentType: doc.componentType,
        title: doc.title ?? null,
        body: doc.body,
        template: doc.template,
        createdAt: doc.createdAt,
        updatedAt: doc.updatedAt
    };
}

/**
 * Content store backed by three MongoDB collections.
 *
 * Pages and components are upserted by ID with ordered `bulkWrite` calls.
 * Snapshots are keyed by page ID and embed copies of the published
 * components. Every write that touches more than one document runs in a
 * transaction, so deleting a subtree removes its pages, components and
 * snapshots and renumbers the surviving siblings together or not at all.
 * The database must therefore be a replica set or sharded cluster.
 *
 * @example
 * ```typescript
 * const store = new MongoContentStore(database, logger);
 * await store.ensureIndexes();
 * const engine = new ContentEngine({ store, logger });
 * ```
 */
export class MongoContentStore implements IContentStore {
    constructor(
        private readonly database: IDatabaseService,
        private readonly logger: ILogger
    ) {}

    private get pages() {
        return this.database.getCollection<IPageDocument>(PAGES_COLLECTION);
    }

    private get components() {
        return this.database.getCollection<IComponentDocument>(COMPONENTS_COLLECTION);
    }

    private get snapshots() {
        return this.database.getCollection<ISnapshotDocument>(SNAPSHOTS_COLLECTION);
    }

    /**
     * Create the lookup indexes used for child and draft listings.
     */
    async ensureIndexes(): Promise<void> {
        await this.database.createIndex(PAGES_COLLECTION, { parentId: 1, position: 1 }, { name: 'parent_position' });
        await this.database.createIndex(COMPONENTS_COLLECTION, { pageId: 1, position: 1 }, { name: 'page_position' });
    }

    async load(): Promise<IContentSnapshot> {
        const [pages, components, snapshots] = await Promise.all([
            this.pages.find({}).toArray(),
            this.components.find({}).toArray(),
            this.snapshots.find({}).toArray()
        ]);

        this.logger.debug(
            { pages: pages.length, components: components.length, snapshots: snapshots.length },
            'Loaded content from MongoDB'
        );

        return {
            pages: pages.map(fromPageDocument),
            components: components.map(fromComponentDocument),
            snapshots: snapshots.map(doc => ({
                pageId: doc._id.toString(),
                version: doc.version,
                publishedAt: doc.publishedAt,
                components: doc.components.map(fromComponentDocument)
            }))
        };
    }

    async savePages(pages: IPageRecord[]): Promise<void> {
        if (pages.length === 0) {
            return;
        }
        await this.database.withTransaction(session => this.writePages(pages, session));
    }

    async deletePages(pageIds: string[], renumbered: IPageRecord[]): Promise<void> {
        if (pageIds.length === 0 && renumbered.length === 0) {
            return;
        }
        const ids = pageIds.map(id => new ObjectId(id));
        await this.database.withTransaction(async session => {
            await this.components.deleteMany({ pageId: { $in: ids } }, { session });
            await this.snapshots.deleteMany({ _id: { $in: ids } }, { session });
            await this.pages.deleteMany({ _id: { $in: ids } }, { session });
            await this.writePages(renumbered, session);
        });
    }

    async saveComponents(components: IComponent[]): Promise<void> {
        if (components.length === 0) {
            return;
        }
        await this.database.withTransaction(session => this.writeComponents(components, session));
    }

    async deleteComponents(componentIds: string[], renumbered: IComponent[]): Promise<void> {
        if (componentIds.length === 0 && renumbered.length === 0) {
            return;
        }
        const ids = componentIds.map(id => new ObjectId(id));
        await this.database.withTransaction(async session => {
            await this.components.deleteMany({ _id: { $in: ids } }, { session });
            await this.writeComponents(renumbered, session);
        });
    }

    async replaceDraft(pageId: string, components: IComponent[]): Promise<void> {
        await this.database.withTransaction(async session => {
            await this.components.deleteMany({ pageId: new ObjectId(pageId) }, { session });
            if (components.length > 0) {
                await this.components.insertMany(components.map(toComponentDocument), { session });
            }
        });
    }

    async saveSnapshot(snapshot: IPublishedSnapshot): Promise<void> {
        await this.snapshots.replaceOne(
            { _id: new ObjectId(snapshot.pageId) },
            {
                version: snapshot.version,
                publishedAt: snapshot.publishedAt,
                components: snapshot.components.map(toComponentDocument)
            },
            { upsert: true }
        );
    }

    private async writePages(pages: IPageRecord[], session: ClientSession): Promise<void> {
        if (pages.length === 0) {
            return;
        }
        const operations: AnyBulkWriteOperation<IPageDocument>[] = pages.map(page => ({
            replaceOne: {
                filter: { _id: new ObjectId(page._id) },
                replacement: toPageDocument(page),
                upsert: true
            }
        }));
        await this.pages.bulkWrite(operations, { ordered: true, session });
    }

    private async writeComponents(components: IComponent[], session: ClientSession): Promise<void> {
        if (components.length === 0) {
            return;
        }
        const operations: AnyBulkWriteOperation<IComponentDocument>[] = components.map(component => {
            const { _id, ...replacement } = toComponentDocument(component);
            return {
                replaceOne: {
                    filter: { _id },
                    replacement,
                    upsert: true
                }
            };
        });
        await this.components.bulkWrite(operations, { ordered: true, session });
    }
}
