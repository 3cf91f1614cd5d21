/**
 * Content block kinds a draft may hold. The engine stores the body as text
 * and never interprets it; the kind only tells renderers what to expect.
 */
export type ComponentType = 'text' | 'markdown' | 'html' | 'code' | 'custom';

/**
 * Ordered content block belonging to a page's draft.
 */
export interface IComponent {
    /**
     * Unique identifier (ObjectId hex string).
     */
    _id: string;

    /**
     * Owning page ID.
     */
    pageId: string;

    /**
     * Dense 0-based index within the page's draft.
     */
    position: number;

    componentType: ComponentType;

    title: string | null;

    body: string;

    /**
     * Opaque template identifier used by renderers.
     */
    template: string;

    createdAt: Date;

    updatedAt: Date;
}

export interface IComponentCreateInput {
    body: string;
    title?: string | null;
    template?: string;
    componentType?: ComponentType;

    /**
     * Target index in the draft, clamped to `[0, componentCount]`. Appends when omitted.
     */
    position?: number;
}

export interface IComponentUpdateInput {
    title?: string | null;
    body?: string;
    template?: string;
}
