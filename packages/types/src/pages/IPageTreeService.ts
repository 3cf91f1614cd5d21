import type { IPage, IPageNodeWithChildren } from './IPage.js';
import type { IPageCreateInput, IPageUpdateInput } from './IPageInput.js';
import type { PageEventSubscriber, PageEventType } from './IPageEvent.js';

/**
 * Service contract for the page hierarchy.
 *
 * Owns the parent/child graph, sibling order and slugs. Every mutation checks
 * its invariants before writing anything, so a rejected call leaves the tree
 * exactly as it was.
 */
export interface IPageTreeService {
    /**
     * Create a page under an existing parent.
     *
     * @throws NotFoundError if the parent does not exist
     */
    create(parentId: string, input: IPageCreateInput): Promise<IPage>;

    /**
     * @throws NotFoundError if the page does not exist
     */
    get(pageId: string): IPage;

    /**
     * Resolve a root-relative path such as `/about/team`.
     *
     * @throws ValidationError if the path contains an empty segment
     * @throws NotFoundError if any segment is unmatched
     */
    getByPath(path: string): IPage;

    /**
     * Whether a page with this ID currently exists.
     */
    has(pageId: string): boolean;

    update(pageId: string, input: IPageUpdateInput): Promise<IPage>;

    /**
     * Change a page's slug explicitly.
     *
     * @throws InvalidOperationError for the root
     * @throws SlugConflictError if a sibling already has the slug
     */
    rename(pageId: string, slug: string): Promise<IPage>;

    /**
     * Re-parent a page, keeping its slug.
     *
     * @throws InvalidOperationError for the root
     * @throws CycleDetectedError if the new parent is the page or one of its descendants
     * @throws SlugConflictError if the new parent already has a child with the page's slug
     */
    move(pageId: string, newParentId: string, position?: number): Promise<IPage>;

    /**
     * Delete a page with its entire subtree, components and snapshots.
     *
     * @throws InvalidOperationError for the root
     */
    delete(pageId: string): Promise<void>;

    getRoot(): IPage;

    getChildren(pageId: string): IPage[];

    /**
     * The whole tree from the root, children in sibling order.
     */
    listTree(): IPageNodeWithChildren;

    /**
     * Every page in depth-first tree order.
     */
    listAll(): IPage[];

    subscribe(eventType: PageEventType, callback: PageEventSubscriber): void;
}
