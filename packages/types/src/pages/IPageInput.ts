/**
 * Input accepted when creating a page under an existing parent.
 */
export interface IPageCreateInput {
    title: string;

    /**
     * Explicit slug. Sanitized, then suffixed (`-2`, `-3`, ...) if a sibling
     * already uses it. Derived from the title when omitted.
     */
    slug?: string;

    template?: string;

    /**
     * Target index among the new siblings, clamped to `[0, siblingCount]`.
     * Appends when omitted.
     */
    position?: number;

    description?: string | null;

    keywords?: string | null;
}

/**
 * Fields that may change without touching the page's place in the tree.
 * A title change never regenerates the slug.
 */
export interface IPageUpdateInput {
    title?: string;
    template?: string;
    description?: string | null;
    keywords?: string | null;
}
