import type {
    ComponentType,
    IComponent,
    IComponentCreateInput,
    IComponentService,
    IComponentUpdateInput,
    IContentStore,
    ILogger,
    IPageTreeService
} from '@quire/types';
import { ObjectId } from 'mongodb';
import { InvalidOperationError, NotFoundError, ValidationError } from '../../../lib/errors.js';
import type { SerialLock } from '../../../lib/serial-lock.js';
import { assertBody, assertTemplate, assertTitle, DEFAULT_TEMPLATE } from './field-validation.js';
import { clampPosition, insertAt, restage } from './ordering.js';

export const COMPONENT_TYPES = ['text', 'markdown', 'html', 'code', 'custom'] as const satisfies readonly ComponentType[];

export const DEFAULT_COMPONENT_TYPE: ComponentType = 'markdown';

export function isComponentType(value: string): value is ComponentType {
    return COMPONENT_TYPES.some(type => type === value);
}

/**
 * Copy a component so callers never hold a reference into the arena.
 */
export function cloneComponent(component: IComponent): IComponent {
    return {
        ...component,
        createdAt: new Date(component.createdAt),
        updatedAt: new Date(component.updatedAt)
    };
}

/**
 * Ordered draft components for every page.
 *
 * Components sit in an arena keyed by ID and each page has an ordered list of
 * its draft component IDs. Positions are dense and 0-based within a page.
 * Mutations share the engine's lock and write through the content store
 * before touching memory, like the page tree.
 *
 * The service does not learn about page deletions by itself; the engine wires
 * {@link dropPages} to the page tree's `after:delete` event.
 */
export class ComponentService implements IComponentService {
    private readonly components = new Map<string, IComponent>();
    private readonly drafts = new Map<string, string[]>();

    constructor(
        private readonly store: IContentStore,
        private readonly lock: SerialLock,
        private readonly pageTree: IPageTreeService,
        private readonly logger: ILogger
    ) {}

    /**
     * Replace the arena with components loaded from the content store.
     *
     * Components of pages the tree does not know are skipped with a warning.
     */
    hydrate(components: IComponent[]): void {
        this.components.clear();
        this.drafts.clear();

        const byPosition = [...components].sort((a, b) => a.position - b.position);
        let orphaned = 0;

        for (const component of byPosition) {
            if (!this.pageTree.has(component.pageId)) {
                orphaned++;
                continue;
            }
            const order = this.drafts.get(component.pageId) ?? [];
            this.components.set(component._id, { ...component, position: order.length });
            order.push(component._id);
            this.drafts.set(component.pageId, order);
        }

        if (orphaned > 0) {
            this.logger.warn({ orphaned }, 'Skipped stored components whose page no longer exists');
        }
        this.logger.debug({ componentCount: this.components.size }, 'Components hydrated');
    }

    /**
     * Add a component to a page's draft.
     *
     * @throws {NotFoundError} When the page does not exist
     * @throws {ValidationError} When a field is out of bounds or the type is unknown
     */
    async create(pageId: string, input: IComponentCreateInput): Promise<IComponent> {
        return this.lock.runExclusive(async () => {
            this.requirePage(pageId);

            const componentType = input.componentType ?? DEFAULT_COMPONENT_TYPE;
            const template = input.template ?? DEFAULT_TEMPLATE;
            const title = input.title ?? null;
            this.assertFields({ componentType, template, title, body: input.body });

            const now = new Date();
            const component: IComponent = {
                _id: new ObjectId().toString(),
                pageId,
                position: 0,
                componentType,
                title,
                body: input.body,
                template,
                createdAt: now,
                updatedAt: now
            };

            const order = insertAt(this.draftIds(pageId), component._id, input.position);
            const pending = new Map<string, IComponent>([[component._id, component]]);
            restage(order, id => this.components.get(id), pending);

            await this.store.saveComponents([...pending.values()]);

            this.commit(pending);
            this.drafts.set(pageId, order);

            this.logger.info({ componentId: component._id, pageId, position: component.position }, 'Component created');
            return cloneComponent(component);
        });
    }

    get(componentId: string): IComponent {
        return cloneComponent(this.requireComponent(componentId));
    }

    /**
     * @throws {NotFoundError} When the component does not exist
     * @throws {ValidationError} When a field is out of bounds
     */
    async update(componentId: string, input: IComponentUpdateInput): Promise<IComponent> {
        return this.lock.runExclusive(async () => {
            const existing = this.requireComponent(componentId);

            const updated: IComponent = {
                ...existing,
                title: input.title !== undefined ? input.title : existing.title,
                body: input.body ?? existing.body,
                template: input.template ?? existing.template,
                updatedAt: new Date()
            };
            this.assertFields(updated);

            await this.store.saveComponents([updated]);

            this.components.set(componentId, updated);

            this.logger.info({ componentId }, 'Component updated');
            return cloneComponent(updated);
        });
    }

    /**
     * Remove a component from its page's draft and close the gap it leaves.
     *
     * @throws {NotFoundError} When the component does not exist
     */
    async delete(componentId: string): Promise<void> {
        return this.lock.runExclusive(async () => {
            const existing = this.requireComponent(componentId);
            const order = this.draftIds(existing.pageId).filter(id => id !== componentId);
            const pending = new Map<string, IComponent>();
            restage(order, id => this.components.get(id), pending);

            await this.store.deleteComponents([componentId], [...pending.values()]);

            this.components.delete(componentId);
            this.commit(pending);
            this.drafts.set(existing.pageId, order);

            this.logger.info({ componentId, pageId: existing.pageId }, 'Component deleted');
        });
    }

    /**
     * Draft components of a page in order.
     *
     * @throws {NotFoundError} When the page does not exist
     */
    list(pageId: string): IComponent[] {
        this.requirePage(pageId);
        return this.draftOf(pageId);
    }

    /**
     * Move a component to a clamped position within its draft.
     *
     * @throws {NotFoundError} When the component does not exist
     */
    async move(componentId: string, position: number): Promise<IComponent> {
        return this.lock.runExclusive(async () => {
            const existing = this.requireComponent(componentId);
            const others = this.draftIds(existing.pageId).filter(id => id !== componentId);
            return this.reorder(existing, others, clampPosition(position, others.length));
        });
    }

    /**
     * Place a component directly before another component of the same page.
     *
     * @throws {NotFoundError} When either component does not exist
     * @throws {InvalidOperationError} When both IDs are equal or the components belong to different pages
     */
    async moveBefore(componentId: string, beforeComponentId: string): Promise<IComponent> {
        return this.lock.runExclusive(async () => {
            const { existing, others, anchorIndex } = this.resolveAnchor(componentId, beforeComponentId, 'before');
            return this.reorder(existing, others, anchorIndex);
        });
    }

    /**
     * Place a component directly after another component of the same page.
     *
     * @throws {NotFoundError} When either component does not exist
     * @throws {InvalidOperationError} When both IDs are equal or the components belong to different pages
     */
    async moveAfter(componentId: string, afterComponentId: string): Promise<IComponent> {
        return this.lock.runExclusive(async () => {
            const { existing, others, anchorIndex } = this.resolveAnchor(componentId, afterComponentId, 'after');
            return this.reorder(existing, others, anchorIndex + 1);
        });
    }

    /**
     * Copies of a page's draft components in order. Unknown pages yield an
     * empty list; callers validate the page first.
     */
    draftOf(pageId: string): IComponent[] {
        return this.draftIds(pageId)
            .map(id => this.components.get(id))
            .filter((component): component is IComponent => component !== undefined)
            .map(cloneComponent);
    }

    /**
     * Swap a page's whole draft for `components`.
     *
     * Runs inside a caller that already holds the engine lock, so it does not
     * take the lock itself.
     */
    async replaceDraft(pageId: string, components: IComponent[]): Promise<void> {
        const replacement = components.map((component, index) => ({
            ...cloneComponent(component),
            pageId,
            position: index
        }));

        await this.store.replaceDraft(pageId, replacement);

        for (const id of this.draftIds(pageId)) {
            this.components.delete(id);
        }
        for (const component of replacement) {
            this.components.set(component._id, component);
        }
        this.drafts.set(
            pageId,
            replacement.map(component => component._id)
        );

        this.logger.debug({ pageId, componentCount: replacement.length }, 'Draft replaced');
    }

    /**
     * Forget the draft of removed pages. Persistence has already dropped them.
     */
    dropPages(pageIds: readonly string[]): void {
        for (const pageId of pageIds) {
            for (const id of this.draftIds(pageId)) {
                this.components.delete(id);
            }
            this.drafts.delete(pageId);
        }
    }

    private async reorder(existing: IComponent, others: string[], index: number): Promise<IComponent> {
        const order = [...others];
        order.splice(index, 0, existing._id);

        const pending = new Map<string, IComponent>();
        restage(order, id => this.components.get(id), pending);

        if (pending.size === 0) {
            return cloneComponent(existing);
        }

        await this.store.saveComponents([...pending.values()]);

        this.commit(pending);
        this.drafts.set(existing.pageId, order);

        const moved = this.requireComponent(existing._id);
        this.logger.info({ componentId: moved._id, pageId: moved.pageId, position: moved.position }, 'Component moved');
        return cloneComponent(moved);
    }

    private resolveAnchor(
        componentId: string,
        anchorId: string,
        relation: 'before' | 'after'
    ): { existing: IComponent; others: string[]; anchorIndex: number } {
        const existing = this.requireComponent(componentId);
        const anchor = this.requireComponent(anchorId);

        if (componentId === anchorId) {
            throw new InvalidOperationError(`Cannot move a component ${relation} itself`, { componentId });
        }
        if (anchor.pageId !== existing.pageId) {
            throw new InvalidOperationError('Components belong to different pages', {
                componentId,
                anchorId,
                pageId: existing.pageId,
                anchorPageId: anchor.pageId
            });
        }

        const others = this.draftIds(existing.pageId).filter(id => id !== componentId);
        return { existing, others, anchorIndex: others.indexOf(anchorId) };
    }

    private assertFields(fields: Pick<IComponent, 'componentType' | 'template' | 'title' | 'body'>): void {
        if (!isComponentType(fields.componentType)) {
            throw new ValidationError(`Unknown component type: ${String(fields.componentType)}`, {
                field: 'componentType',
                allowed: COMPONENT_TYPES
            });
        }
        assertTemplate(fields.template);
        assertTitle(fields.title);
        assertBody(fields.body);
    }

    private requirePage(pageId: string): void {
        if (!this.pageTree.has(pageId)) {
            throw new NotFoundError(`Page not found: ${pageId}`, { pageId });
        }
    }

    private requireComponent(componentId: string): IComponent {
        const component = this.components.get(componentId);
        if (!component) {
            throw new NotFoundError(`Component not found: ${componentId}`, { componentId });
        }
        return component;
    }

    private draftIds(pageId: string): string[] {
        return this.drafts.get(pageId) ?? [];
    }

    private commit(records: Map<string, IComponent>): void {
        for (const [id, record] of records) {
            this.components.set(id, record);
        }
    }
}
