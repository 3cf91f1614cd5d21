import type { IContentStore, ILogger } from '@quire/types';
import { SerialLock } from '../../../lib/serial-lock.js';
import { ComponentService } from './component.service.js';
import { DEFAULT_TEMPLATE } from './field-validation.js';
import { PageSearchService } from './page-search.service.js';
import { PageTreeService } from './page-tree.service.js';
import { VersionService } from './version.service.js';

export interface IContentEngineOptions {
    store: IContentStore;
    logger: ILogger;

    /**
     * Title of the root page created for an empty store. Defaults to `Home`.
     */
    rootTitle?: string;

    rootTemplate?: string;
}

/**
 * Composition root for the page and content services.
 *
 * Builds one page tree, component service, version service and search over a
 * single content store and a single lock, and wires page deletion to the
 * component and version services. Nothing here is a singleton; every engine
 * is independent, which is how tests get a fresh tree each time.
 *
 * @example
 * ```typescript
 * const engine = new ContentEngine({ store: new MemoryContentStore(), logger });
 * await engine.initialize();
 * const about = await engine.pages.create(engine.pages.getRoot()._id, { title: 'About' });
 * await engine.components.create(about._id, { body: '# About' });
 * await engine.versions.publish(about._id);
 * ```
 */
export class ContentEngine {
    readonly pages: PageTreeService;
    readonly components: ComponentService;
    readonly versions: VersionService;
    readonly search: PageSearchService;

    private readonly store: IContentStore;
    private readonly logger: ILogger;
    private readonly rootTitle: string;
    private readonly rootTemplate: string;
    private initialized = false;

    constructor(options: IContentEngineOptions) {
        this.store = options.store;
        this.logger = options.logger;
        this.rootTitle = options.rootTitle ?? 'Home';
        this.rootTemplate = options.rootTemplate ?? DEFAULT_TEMPLATE;

        const lock = new SerialLock();
        this.pages = new PageTreeService(this.store, lock, this.logger.child({ module: 'page-tree' }));
        this.components = new ComponentService(
            this.store,
            lock,
            this.pages,
            this.logger.child({ module: 'components' })
        );
        this.versions = new VersionService(
            this.store,
            lock,
            this.pages,
            this.components,
            this.logger.child({ module: 'versions' })
        );
        this.search = new PageSearchService(this.pages, this.versions);

        this.pages.subscribe('after:delete', event => {
            const removed = event.removedPageIds ?? [event.page._id];
            this.components.dropPages(removed);
            this.versions.dropPages(removed);
        });
    }

    get isInitialized(): boolean {
        return this.initialized;
    }

    /**
     * Load everything from the store and rebuild the in-memory state.
     *
     * An empty store gets a root page. Calling this again after it succeeded
     * does nothing.
     *
     * @throws {Error} When the stored pages do not form a single rooted tree
     */
    async initialize(): Promise<void> {
        if (this.initialized) {
            return;
        }

        const content = await this.store.load();

        this.pages.hydrate(content.pages);
        this.components.hydrate(content.components);
        this.versions.hydrate(content.snapshots);

        if (content.pages.length === 0) {
            await this.pages.createRoot(this.rootTitle, this.rootTemplate);
        }

        this.initialized = true;
        this.logger.info(
            {
                pages: this.pages.listAll().length,
                components: content.components.length,
                snapshots: content.snapshots.length
            },
            'Content engine initialized'
        );
    }
}
