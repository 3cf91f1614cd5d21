import type { IComponent, IContentSnapshot, IContentStore, IPageRecord, IPublishedSnapshot } from '@quire/types';

/**
 * Content store that keeps structured clones in process memory.
 *
 * The default driver when no database is configured, and the stand-in used by
 * tests. Nothing outside the store ever holds a reference to what it keeps.
 * Each method finishes its changes without yielding, so a call either applies
 * completely or, when a test replaces it with a rejection, not at all.
 */
export class MemoryContentStore implements IContentStore {
    private readonly pages = new Map<string, IPageRecord>();
    private readonly components = new Map<string, IComponent>();
    private readonly snapshots = new Map<string, IPublishedSnapshot>();

    async load(): Promise<IContentSnapshot> {
        return structuredClone({
            pages: [...this.pages.values()],
            components: [...this.components.values()],
            snapshots: [...this.snapshots.values()]
        });
    }

    async savePages(pages: IPageRecord[]): Promise<void> {
        for (const page of pages) {
            this.pages.set(page._id, structuredClone(page));
        }
    }

    async deletePages(pageIds: string[], renumbered: IPageRecord[]): Promise<void> {
        const removed = new Set(pageIds);
        for (const pageId of pageIds) {
            this.pages.delete(pageId);
            this.snapshots.delete(pageId);
        }
        for (const [id, component] of this.components) {
            if (removed.has(component.pageId)) {
                this.components.delete(id);
            }
        }
        await this.savePages(renumbered);
    }

    async saveComponents(components: IComponent[]): Promise<void> {
        for (const component of components) {
            this.components.set(component._id, structuredClone(component));
        }
    }

    async deleteComponents(componentIds: string[], renumbered: IComponent[]): Promise<void> {
        for (const id of componentIds) {
            this.components.delete(id);
        }
        await this.saveComponents(renumbered);
    }

    async replaceDraft(pageId: string, components: IComponent[]): Promise<void> {
        for (const [id, component] of this.components) {
            if (component.pageId === pageId) {
                this.components.delete(id);
            }
        }
        await this.saveComponents(components);
    }

    async saveSnapshot(snapshot: IPublishedSnapshot): Promise<void> {
        this.snapshots.set(snapshot.pageId, structuredClone(snapshot));
    }
}
