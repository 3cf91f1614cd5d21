import type { IComponent } from '../components/IComponent.js';

/**
 * Last published state of a page.
 *
 * Components are deep copies taken at publish time and keep the IDs and
 * positions they had in the draft, so discarding a draft restores exactly
 * this list.
 */
export interface IPublishedSnapshot {
    pageId: string;

    /**
     * 1 on first publish, incremented on each later publish.
     */
    version: number;

    publishedAt: Date;

    components: IComponent[];
}

/**
 * Draft-versus-published state of a page.
 */
export interface IDraftStatus {
    pageId: string;

    /**
     * Whether the draft's ordered content differs from the published snapshot
     * (a page that was never published compares against an empty list).
     */
    hasDraftChanges: boolean;

    hasPublished: boolean;

    publishedVersion: number | null;

    publishedAt: Date | null;

    draftComponentCount: number;

    publishedComponentCount: number;
}
