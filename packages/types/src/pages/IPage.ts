/**
 * Stored attributes of a page in the content tree.
 *
 * The tree owns every structural field here (parent, slug, position). The
 * materialized path is never stored; see {@link IPage} for the derived view.
 */
export interface IPageRecord {
    /**
     * Unique identifier (ObjectId hex string). Assigned at creation, never reused.
     */
    _id: string;

    /**
     * Parent page ID. Null only for the single root page.
     */
    parentId: string | null;

    /**
     * Free-text title shown in navigation and admin lists.
     */
    title: string;

    /**
     * URL-safe path segment, unique among the page's siblings.
     * The root page carries the empty slug.
     */
    slug: string;

    /**
     * Dense 0-based index among siblings.
     */
    position: number;

    /**
     * Opaque template identifier, not interpreted by the engine.
     */
    template: string;

    /**
     * Short description for listings and search.
     */
    description: string | null;

    /**
     * Comma-separated keywords for listings and search.
     */
    keywords: string | null;

    createdAt: Date;

    updatedAt: Date;
}

/**
 * Page as returned to callers, with fields derived from the current structure.
 */
export interface IPage extends IPageRecord {
    /**
     * Materialized path: `/` for the root, otherwise the slugs below the root
     * joined by `/` (e.g. `/about/team`).
     */
    path: string;

    /**
     * Whether the page currently has at least one child.
     */
    hasChildren: boolean;
}

/**
 * Page with its ordered children for tree representation.
 */
export interface IPageNodeWithChildren extends IPage {
    children: IPageNodeWithChildren[];
}
