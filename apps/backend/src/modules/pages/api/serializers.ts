import type { IComponent, IDraftStatus, IPage, IPageNodeWithChildren } from '@quire/types';

/**
 * Wire shapes returned by the RPC dispatcher and the public REST routes.
 * Keys are snake_case and dates are ISO-8601 strings.
 */

export interface PageWire {
    id: string;
    parent_id: string | null;
    title: string;
    slug: string;
    path: string;
    position: number;
    template: string;
    description: string | null;
    keywords: string | null;
    has_children: boolean;
    created_at: string;
    updated_at: string;
}

export interface PageNodeWire extends PageWire {
    children: PageNodeWire[];
}

export interface ComponentWire {
    id: string;
    page_id: string;
    position: number;
    component_type: string;
    title: string | null;
    body: string;
    template: string;
    created_at: string;
    updated_at: string;
}

export interface DraftStatusWire {
    page_id: string;
    has_draft_changes: boolean;
    has_published: boolean;
    published_version: number | null;
    published_at: string | null;
    draft_component_count: number;
    published_component_count: number;
}

export function serializePage(page: IPage): PageWire {
    return {
        id: page._id,
        parent_id: page.parentId,
        title: page.title,
        slug: page.slug,
        path: page.path,
        position: page.position,
        template: page.template,
        description: page.description,
        keywords: page.keywords,
        has_children: page.hasChildren,
        created_at: page.createdAt.toISOString(),
        updated_at: page.updatedAt.toISOString()
    };
}

export function serializePageTree(node: IPageNodeWithChildren): PageNodeWire {
    return {
        ...serializePage(node),
        children: node.children.map(serializePageTree)
    };
}

export function serializeComponent(component: IComponent): ComponentWire {
    return {
        id: component._id,
        page_id: component.pageId,
        position: component.position,
        component_type: component.componentType,
        title: component.title,
        body: component.body,
        template: component.template,
        created_at: component.createdAt.toISOString(),
        updated_at: component.updatedAt.toISOString()
    };
}

export function serializeDraftStatus(status: IDraftStatus): DraftStatusWire {
    return {
        page_id: status.pageId,
        has_draft_changes: status.hasDraftChanges,
        has_published: status.hasPublished,
        published_version: status.publishedVersion,
        published_at: status.publishedAt ? status.publishedAt.toISOString() : null,
        draft_component_count: status.draftComponentCount,
        published_component_count: status.publishedComponentCount
    };
}
