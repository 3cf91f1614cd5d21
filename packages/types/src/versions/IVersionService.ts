import type { IComponent } from '../components/IComponent.js';
import type { IDraftStatus } from './IPublishedSnapshot.js';

/**
 * Service contract for draft and published content of pages.
 *
 * All methods throw NotFoundError when the page does not exist.
 */
export interface IVersionService {
    getDraft(pageId: string): IComponent[];

    /**
     * Last published components, or an empty list if never published.
     */
    getPublished(pageId: string): IComponent[];

    getStatus(pageId: string): IDraftStatus;

    /**
     * Copy the draft into a new published snapshot. The draft itself is kept.
     */
    publish(pageId: string): Promise<IDraftStatus>;

    /**
     * Replace the draft with the published snapshot, or empty it if the page
     * was never published.
     */
    discardDraft(pageId: string): Promise<IDraftStatus>;
}
