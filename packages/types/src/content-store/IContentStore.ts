import type { IPageRecord } from '../pages/IPage.js';
import type { IComponent } from '../components/IComponent.js';
import type { IPublishedSnapshot } from '../versions/IPublishedSnapshot.js';

/**
 * Everything the engine needs to rebuild its in-memory state.
 */
export interface IContentSnapshot {
    pages: IPageRecord[];
    components: IComponent[];
    snapshots: IPublishedSnapshot[];
}

/**
 * Persistence port for pages, draft components and published snapshots.
 *
 * The engine writes through this port before applying a change in memory, so
 * a rejected write leaves the observable state untouched. Every method is one
 * all-or-nothing write: when it rejects, nothing it was given has been stored.
 */
export interface IContentStore {
    load(): Promise<IContentSnapshot>;

    /**
     * Insert or replace pages by ID.
     */
    savePages(pages: IPageRecord[]): Promise<void>;

    /**
     * Remove pages together with their draft components and snapshots, and
     * save the renumbered siblings left behind.
     */
    deletePages(pageIds: string[], renumbered: IPageRecord[]): Promise<void>;

    /**
     * Insert or replace components by ID.
     */
    saveComponents(components: IComponent[]): Promise<void>;

    /**
     * Remove components and save the renumbered components left behind.
     */
    deleteComponents(componentIds: string[], renumbered: IComponent[]): Promise<void>;

    /**
     * Replace every draft component of a page with the given list.
     */
    replaceDraft(pageId: string, components: IComponent[]): Promise<void>;

    /**
     * Insert or replace the published snapshot of a page.
     */
    saveSnapshot(snapshot: IPublishedSnapshot): Promise<void>;
}
