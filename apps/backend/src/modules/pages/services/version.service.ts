import type {
    IComponent,
    IContentStore,
    IDraftStatus,
    ILogger,
    IPageTreeService,
    IPublishedSnapshot,
    IVersionService
} from '@quire/types';
import { NotFoundError } from '../../../lib/errors.js';
import type { SerialLock } from '../../../lib/serial-lock.js';
import { cloneComponent, type ComponentService } from './component.service.js';

function sameContent(draft: readonly IComponent[], published: readonly IComponent[]): boolean {
    if (draft.length !== published.length) {
        return false;
    }
    return draft.every((component, index) => {
        const other = published[index];
        return (
            other !== undefined &&
            component.componentType === other.componentType &&
            component.title === other.title &&
            component.body === other.body &&
            component.template === other.template
        );
    });
}

/**
 * Draft versus published content per page.
 *
 * The draft is whatever the component service holds for a page. Publishing
 * copies it into a snapshot that replaces any earlier one and bumps the
 * version; the draft itself stays editable. Discarding copies the snapshot
 * back over the draft, keeping the published component IDs, so discarding
 * twice gives the same result as discarding once.
 */
export class VersionService implements IVersionService {
    private readonly snapshots = new Map<string, IPublishedSnapshot>();

    constructor(
        private readonly store: IContentStore,
        private readonly lock: SerialLock,
        private readonly pageTree: IPageTreeService,
        private readonly components: ComponentService,
        private readonly logger: ILogger
    ) {}

    hydrate(snapshots: IPublishedSnapshot[]): void {
        this.snapshots.clear();
        const orphaned: string[] = [];
        for (const snapshot of snapshots) {
            if (!this.pageTree.has(snapshot.pageId)) {
                orphaned.push(snapshot.pageId);
                continue;
            }
            this.snapshots.set(snapshot.pageId, {
                ...snapshot,
                components: snapshot.components.map(cloneComponent)
            });
        }
        if (orphaned.length > 0) {
            this.logger.warn({ orphaned }, 'Skipped stored snapshots whose page no longer exists');
        }
        this.logger.debug({ snapshotCount: this.snapshots.size }, 'Published snapshots hydrated');
    }

    /**
     * @throws {NotFoundError} When the page does not exist
     */
    getDraft(pageId: string): IComponent[] {
        this.requirePage(pageId);
        return this.components.draftOf(pageId);
    }

    /**
     * Components of the last publish; empty for a page never published.
     *
     * @throws {NotFoundError} When the page does not exist
     */
    getPublished(pageId: string): IComponent[] {
        this.requirePage(pageId);
        return this.snapshots.get(pageId)?.components.map(cloneComponent) ?? [];
    }

    /**
     * @throws {NotFoundError} When the page does not exist
     */
    getStatus(pageId: string): IDraftStatus {
        this.requirePage(pageId);

        const draft = this.components.draftOf(pageId);
        const snapshot = this.snapshots.get(pageId);
        const published = snapshot?.components ?? [];

        return {
            pageId,
            hasDraftChanges: !sameContent(draft, published),
            hasPublished: snapshot !== undefined,
            publishedVersion: snapshot?.version ?? null,
            publishedAt: snapshot ? new Date(snapshot.publishedAt) : null,
            draftComponentCount: draft.length,
            publishedComponentCount: published.length
        };
    }

    /**
     * Snapshot the current draft as the page's published content.
     *
     * @throws {NotFoundError} When the page does not exist
     */
    async publish(pageId: string): Promise<IDraftStatus> {
        return this.lock.runExclusive(async () => {
            this.requirePage(pageId);

            const previous = this.snapshots.get(pageId);
            const snapshot: IPublishedSnapshot = {
                pageId,
                version: (previous?.version ?? 0) + 1,
                publishedAt: new Date(),
                components: this.components.draftOf(pageId)
            };

            await this.store.saveSnapshot(snapshot);

            this.snapshots.set(pageId, snapshot);

            this.logger.info(
                { pageId, version: snapshot.version, componentCount: snapshot.components.length },
                'Draft published'
            );
            return this.getStatus(pageId);
        });
    }

    /**
     * Reset the draft to the published content, or to nothing when the page
     * has never been published.
     *
     * @throws {NotFoundError} When the page does not exist
     */
    async discardDraft(pageId: string): Promise<IDraftStatus> {
        return this.lock.runExclusive(async () => {
            this.requirePage(pageId);

            const restored = this.snapshots.get(pageId)?.components ?? [];
            await this.components.replaceDraft(pageId, restored);

            this.logger.info({ pageId, componentCount: restored.length }, 'Draft discarded');
            return this.getStatus(pageId);
        });
    }

    dropPages(pageIds: readonly string[]): void {
        for (const pageId of pageIds) {
            this.snapshots.delete(pageId);
        }
    }

    private requirePage(pageId: string): void {
        if (!this.pageTree.has(pageId)) {
            throw new NotFoundError(`Page not found: ${pageId}`, { pageId });
        }
    }
}
