import type {
    IContentStore,
    ILogger,
    IPage,
    IPageCreateInput,
    IPageEvent,
    IPageNodeWithChildren,
    IPageRecord,
    IPageTreeService,
    IPageUpdateInput,
    PageEventSubscriber,
    PageEventType
} from '@quire/types';
import { ObjectId } from 'mongodb';
import {
    CycleDetectedError,
    InvalidOperationError,
    NotFoundError,
    SlugConflictError,
    ValidationError
} from '../../../lib/errors.js';
import type { SerialLock } from '../../../lib/serial-lock.js';
import {
    assertDescription,
    assertKeywords,
    assertTemplate,
    assertTitle,
    DEFAULT_TEMPLATE
} from './field-validation.js';
import { insertAt, restage } from './ordering.js';
import { generateSlug, sanitizeSlug } from './slug-generator.js';

/**
 * Authoritative in-memory page hierarchy.
 *
 * Pages live in an arena keyed by ID; each page also owns an ordered list of
 * child IDs whose indices are the children's positions. Paths are never
 * stored, they are rebuilt from slugs on every read, so renames and moves
 * never have to touch descendants.
 *
 * Every mutation runs inside the shared {@link SerialLock} and follows the
 * same shape: check invariants against the arena, stage the changed records,
 * write them through the content store, then apply them to the arena in one
 * synchronous step. A rejected store write therefore leaves the tree exactly
 * as it was.
 *
 * Subscribers registered with {@link subscribe} are notified after a change
 * has been applied. The component and version services use `after:delete` to
 * drop state that belonged to removed pages.
 *
 * @example
 * ```typescript
 * const tree = new PageTreeService(store, lock, logger);
 * await tree.createRoot('Home');
 * const about = await tree.create(tree.getRoot()._id, { title: 'About Us' });
 * const team = await tree.create(about._id, { title: 'Team' });
 * team.path; // '/about-us/team'
 * ```
 */
export class PageTreeService implements IPageTreeService {
    private readonly pages = new Map<string, IPageRecord>();
    private readonly children = new Map<string, string[]>();
    private readonly subscribers = new Map<PageEventType, PageEventSubscriber[]>();
    private rootId: string | null = null;

    constructor(
        private readonly store: IContentStore,
        private readonly lock: SerialLock,
        private readonly logger: ILogger
    ) {}

    /**
     * Replace the arena with records loaded from the content store.
     *
     * Children are ordered by their stored position and then renumbered densely
     * in memory. Data that cannot form a single rooted tree is rejected.
     *
     * @throws {Error} When there is not exactly one root, a parent is missing, or a page is unreachable from the root
     */
    hydrate(records: IPageRecord[]): void {
        this.pages.clear();
        this.children.clear();
        this.rootId = null;

        if (records.length === 0) {
            return;
        }

        const roots = records.filter(record => record.parentId === null);
        const [root] = roots;
        if (!root || roots.length > 1) {
            throw new Error(`Stored page tree must have exactly one root, found ${roots.length}`);
        }

        for (const record of records) {
            this.pages.set(record._id, { ...record });
            this.children.set(record._id, []);
        }

        const byPosition = [...records].sort((a, b) => a.position - b.position);
        for (const record of byPosition) {
            if (record.parentId === null) {
                continue;
            }
            const siblings = this.children.get(record.parentId);
            if (!siblings) {
                throw new Error(`Page ${record._id} references missing parent ${record.parentId}`);
            }
            siblings.push(record._id);
        }

        this.rootId = root._id;

        const reachable = this.collectSubtree(root._id);
        if (reachable.length !== this.pages.size) {
            throw new Error(
                `Stored page tree has ${this.pages.size - reachable.length} page(s) unreachable from the root`
            );
        }

        for (const order of this.children.values()) {
            order.forEach((id, index) => {
                const record = this.pages.get(id);
                if (record) {
                    record.position = index;
                }
            });
        }

        const rootRecord = this.pages.get(root._id);
        if (rootRecord) {
            rootRecord.position = 0;
        }

        this.logger.debug({ pageCount: this.pages.size }, 'Page tree hydrated');
    }

    /**
     * Create the root page of an empty tree.
     *
     * @throws {InvalidOperationError} When a root already exists
     */
    async createRoot(title: string, template = DEFAULT_TEMPLATE): Promise<IPage> {
        return this.lock.runExclusive(async () => {
            if (this.rootId !== null) {
                throw new InvalidOperationError('Root page already exists', { rootId: this.rootId });
            }
            assertTitle(title);
            assertTemplate(template);

            const now = new Date();
            const root: IPageRecord = {
                _id: new ObjectId().toString(),
                parentId: null,
                title,
                slug: '',
                position: 0,
                template,
                description: null,
                keywords: null,
                createdAt: now,
                updatedAt: now
            };

            await this.store.savePages([root]);

            this.pages.set(root._id, root);
            this.children.set(root._id, []);
            this.rootId = root._id;

            this.logger.info({ pageId: root._id }, 'Root page created');
            this.emit('after:create', root);

            return this.toPage(root);
        });
    }

    /**
     * Create a page under `parentId`.
     *
     * The slug is generated from the title (or the explicit slug) and made
     * unique among the parent's current children. The page is inserted at the
     * clamped position, appending by default, and later siblings shift down.
     *
     * @throws {NotFoundError} When the parent does not exist
     * @throws {ValidationError} When a field is too long or the template is invalid
     */
    async create(parentId: string, input: IPageCreateInput): Promise<IPage> {
        return this.lock.runExclusive(async () => {
            this.requireRecord(parentId, 'Parent page');

            const template = input.template ?? DEFAULT_TEMPLATE;
            assertTitle(input.title);
            assertTemplate(template);
            assertDescription(input.description ?? null);
            assertKeywords(input.keywords ?? null);

            const siblingIds = this.childIds(parentId);
            const slug = generateSlug(input.title, input.slug, this.slugsOf(siblingIds));

            const now = new Date();
            const record: IPageRecord = {
                _id: new ObjectId().toString(),
                parentId,
                title: input.title,
                slug,
                position: 0,
                template,
                description: input.description ?? null,
                keywords: input.keywords ?? null,
                createdAt: now,
                updatedAt: now
            };

            const order = insertAt(siblingIds, record._id, input.position);
            const pending = new Map<string, IPageRecord>([[record._id, record]]);
            restage(order, id => this.pages.get(id), pending);

            await this.store.savePages([...pending.values()]);

            this.commit(pending);
            this.children.set(parentId, order);
            this.children.set(record._id, []);

            this.logger.info({ pageId: record._id, parentId, slug }, 'Page created');
            this.emit('after:create', record);

            return this.toPage(record);
        });
    }

    get(pageId: string): IPage {
        return this.toPage(this.requireRecord(pageId));
    }

    has(pageId: string): boolean {
        return this.pages.has(pageId);
    }

    /**
     * Resolve a URL path to a page by walking slugs down from the root.
     *
     * `/` and the empty string name the root. Leading and trailing slashes are
     * ignored.
     *
     * @throws {ValidationError} When the path contains an empty segment such as `/a//b`
     * @throws {NotFoundError} When a segment matches no child
     */
    getByPath(path: string): IPage {
        const root = this.requireRoot();
        const trimmed = path.trim().replace(/^\/+|\/+$/g, '');

        if (trimmed.length === 0) {
            return this.toPage(root);
        }

        const segments = trimmed.split('/');
        if (segments.some(segment => segment.length === 0)) {
            throw new ValidationError(`Path contains an empty segment: ${path}`, { path });
        }

        let current = root;
        for (const segment of segments) {
            const next = this.childIds(current._id)
                .map(id => this.pages.get(id))
                .find(child => child?.slug === segment);
            if (!next) {
                throw new NotFoundError(`Page not found at path: ${path}`, { path, segment });
            }
            current = next;
        }

        return this.toPage(current);
    }

    /**
     * Update page metadata. The slug is left alone; use {@link rename} for that.
     *
     * @throws {NotFoundError} When the page does not exist
     * @throws {ValidationError} When a field is too long or the template is invalid
     */
    async update(pageId: string, input: IPageUpdateInput): Promise<IPage> {
        return this.lock.runExclusive(async () => {
            const existing = this.requireRecord(pageId);

            if (input.title !== undefined) {
                assertTitle(input.title);
            }
            if (input.template !== undefined) {
                assertTemplate(input.template);
            }
            if (input.description !== undefined) {
                assertDescription(input.description);
            }
            if (input.keywords !== undefined) {
                assertKeywords(input.keywords);
            }

            const updated: IPageRecord = {
                ...existing,
                title: input.title ?? existing.title,
                template: input.template ?? existing.template,
                description: input.description !== undefined ? input.description : existing.description,
                keywords: input.keywords !== undefined ? input.keywords : existing.keywords,
                updatedAt: new Date()
            };

            await this.store.savePages([updated]);

            this.pages.set(pageId, updated);

            this.logger.info({ pageId }, 'Page updated');
            this.emit('after:update', updated);

            return this.toPage(updated);
        });
    }

    /**
     * Change a page's slug. The input is sanitized but never suffixed.
     *
     * @throws {NotFoundError} When the page does not exist
     * @throws {InvalidOperationError} When the page is the root
     * @throws {SlugConflictError} When a sibling already uses the sanitized slug
     */
    async rename(pageId: string, slug: string): Promise<IPage> {
        return this.lock.runExclusive(async () => {
            const existing = this.requireRecord(pageId);
            if (existing.parentId === null) {
                throw new InvalidOperationError('Cannot rename the root page', { pageId });
            }

            const nextSlug = sanitizeSlug(slug);
            if (nextSlug === existing.slug) {
                return this.toPage(existing);
            }

            const siblings = this.childIds(existing.parentId).filter(id => id !== pageId);
            if (this.slugsOf(siblings).has(nextSlug)) {
                throw new SlugConflictError(`Slug "${nextSlug}" is already used by a sibling page`, {
                    pageId,
                    slug: nextSlug
                });
            }

            const updated: IPageRecord = { ...existing, slug: nextSlug, updatedAt: new Date() };

            await this.store.savePages([updated]);

            this.pages.set(pageId, updated);

            this.logger.info({ pageId, from: existing.slug, to: nextSlug }, 'Page renamed');
            this.emit('after:update', updated);

            return this.toPage(updated);
        });
    }

    /**
     * Re-parent a page together with its subtree.
     *
     * The page keeps its slug and lands at the clamped `position` among the new
     * parent's other children (appending by default). Moving within the same
     * parent is a reorder.
     *
     * @throws {NotFoundError} When the page or the new parent does not exist
     * @throws {InvalidOperationError} When the page is the root
     * @throws {CycleDetectedError} When the new parent is the page itself or one of its descendants
     * @throws {SlugConflictError} When another child of the new parent has the same slug
     */
    async move(pageId: string, newParentId: string, position?: number): Promise<IPage> {
        return this.lock.runExclusive(async () => {
            const existing = this.requireRecord(pageId);
            const oldParentId = existing.parentId;
            if (oldParentId === null) {
                throw new InvalidOperationError('Cannot move the root page', { pageId });
            }

            this.requireRecord(newParentId, 'New parent page');

            if (this.isSelfOrAncestor(pageId, newParentId)) {
                throw new CycleDetectedError('Cannot move a page under itself or one of its descendants', {
                    pageId,
                    newParentId
                });
            }

            const targetSiblings = this.childIds(newParentId).filter(id => id !== pageId);
            if (this.slugsOf(targetSiblings).has(existing.slug)) {
                throw new SlugConflictError(`Slug "${existing.slug}" is already used under the new parent`, {
                    pageId,
                    newParentId,
                    slug: existing.slug
                });
            }

            const moved: IPageRecord = { ...existing, parentId: newParentId, updatedAt: new Date() };
            const pending = new Map<string, IPageRecord>([[pageId, moved]]);

            const oldOrder = this.childIds(oldParentId).filter(id => id !== pageId);
            const newOrder = insertAt(targetSiblings, pageId, position);
            if (oldParentId !== newParentId) {
                restage(oldOrder, id => this.pages.get(id), pending);
            }
            restage(newOrder, id => this.pages.get(id), pending);

            await this.store.savePages([...pending.values()]);

            this.commit(pending);
            if (oldParentId !== newParentId) {
                this.children.set(oldParentId, oldOrder);
            }
            this.children.set(newParentId, newOrder);

            this.logger.info({ pageId, from: oldParentId, to: newParentId, position: moved.position }, 'Page moved');
            this.emit('after:move', moved);

            return this.toPage(moved);
        });
    }

    /**
     * Delete a page and its whole subtree.
     *
     * One store write removes the pages together with their components and
     * snapshots and renumbers the remaining siblings; subscribers to `after:delete` receive every removed ID.
     *
     * @throws {NotFoundError} When the page does not exist
     * @throws {InvalidOperationError} When the page is the root
     */
    async delete(pageId: string): Promise<void> {
        return this.lock.runExclusive(async () => {
            const existing = this.requireRecord(pageId);
            const parentId = existing.parentId;
            if (parentId === null) {
                throw new InvalidOperationError('Cannot delete the root page', { pageId });
            }

            const removedPageIds = this.collectSubtree(pageId);
            const siblingOrder = this.childIds(parentId).filter(id => id !== pageId);
            const pending = new Map<string, IPageRecord>();
            restage(siblingOrder, id => this.pages.get(id), pending);

            await this.store.deletePages(removedPageIds, [...pending.values()]);

            for (const id of removedPageIds) {
                this.pages.delete(id);
                this.children.delete(id);
            }
            this.commit(pending);
            this.children.set(parentId, siblingOrder);

            this.logger.info({ pageId, removedCount: removedPageIds.length }, 'Page subtree deleted');
            this.emit('after:delete', existing, removedPageIds);
        });
    }

    getRoot(): IPage {
        return this.toPage(this.requireRoot());
    }

    /**
     * @throws {NotFoundError} When the page does not exist
     */
    getChildren(pageId: string): IPage[] {
        this.requireRecord(pageId);
        return this.childRecords(pageId).map(record => this.toPage(record));
    }

    listTree(): IPageNodeWithChildren {
        const build = (record: IPageRecord): IPageNodeWithChildren => ({
            ...this.toPage(record),
            children: this.childRecords(record._id).map(build)
        });
        return build(this.requireRoot());
    }

    /**
     * Every page in depth-first tree order, starting at the root.
     */
    listAll(): IPage[] {
        if (this.rootId === null) {
            return [];
        }
        return this.collectSubtree(this.rootId).map(id => this.toPage(this.requireRecord(id)));
    }

    /**
     * Register a callback for a page event.
     *
     * Subscribers run synchronously after the change is applied, in
     * registration order. A subscriber that throws is logged and skipped; the
     * operation itself has already succeeded.
     */
    subscribe(eventType: PageEventType, callback: PageEventSubscriber): void {
        const existing = this.subscribers.get(eventType) ?? [];
        existing.push(callback);
        this.subscribers.set(eventType, existing);
        this.logger.debug({ eventType }, 'Page event subscriber registered');
    }

    private emit(type: PageEventType, page: IPageRecord, removedPageIds?: string[]): void {
        const event: IPageEvent = { type, page: { ...page }, timestamp: new Date() };
        if (removedPageIds) {
            event.removedPageIds = [...removedPageIds];
        }

        for (const subscriber of this.subscribers.get(type) ?? []) {
            try {
                subscriber(event);
            } catch (error) {
                this.logger.error({ error, eventType: type, pageId: page._id }, 'Page event subscriber threw error');
            }
        }
    }

    private requireRecord(pageId: string, label = 'Page'): IPageRecord {
        const record = this.pages.get(pageId);
        if (!record) {
            throw new NotFoundError(`${label} not found: ${pageId}`, { pageId });
        }
        return record;
    }

    private requireRoot(): IPageRecord {
        const root = this.rootId === null ? undefined : this.pages.get(this.rootId);
        if (!root) {
            throw new Error('Page tree has no root; initialize the content engine first');
        }
        return root;
    }

    private childIds(pageId: string): string[] {
        return this.children.get(pageId) ?? [];
    }

    private childRecords(pageId: string): IPageRecord[] {
        return this.childIds(pageId).map(id => this.requireRecord(id));
    }

    private slugsOf(pageIds: readonly string[]): Set<string> {
        const slugs = new Set<string>();
        for (const id of pageIds) {
            const record = this.pages.get(id);
            if (record) {
                slugs.add(record.slug);
            }
        }
        return slugs;
    }

    /**
     * Walk from `candidateId` up to the root looking for `pageId`.
     */
    private isSelfOrAncestor(pageId: string, candidateId: string): boolean {
        let current: string | null = candidateId;
        while (current !== null) {
            if (current === pageId) {
                return true;
            }
            current = this.pages.get(current)?.parentId ?? null;
        }
        return false;
    }

    /**
     * IDs of a page and all its descendants in depth-first pre-order.
     */
    private collectSubtree(pageId: string): string[] {
        const result: string[] = [];
        const stack = [pageId];
        while (stack.length > 0) {
            const id = stack.pop();
            if (id === undefined) {
                break;
            }
            result.push(id);
            const childIds = this.childIds(id);
            for (let index = childIds.length - 1; index >= 0; index--) {
                stack.push(childIds[index]);
            }
        }
        return result;
    }

    private commit(records: Map<string, IPageRecord>): void {
        for (const [id, record] of records) {
            this.pages.set(id, record);
        }
    }

    private pathOf(record: IPageRecord): string {
        const segments: string[] = [];
        let current: IPageRecord | undefined = record;
        while (current && current.parentId !== null) {
            segments.push(current.slug);
            current = this.pages.get(current.parentId);
        }
        return '/' + segments.reverse().join('/');
    }

    private toPage(record: IPageRecord): IPage {
        return {
            ...record,
            path: this.pathOf(record),
            hasChildren: this.childIds(record._id).length > 0
        };
    }
}
