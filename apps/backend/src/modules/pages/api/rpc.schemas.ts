import { z } from 'zod';
import { COMPONENT_TYPES } from '../services/component.service.js';

const id = z.string().trim().min(1);
const position = z.number().int();
const nullableText = z.string().nullable();

const pageIdParams = z.object({ page_id: id });
const componentIdParams = z.object({ component_id: id });

/**
 * Parameter schemas for every RPC method, keyed by method name.
 *
 * Unknown keys are stripped. Page and component IDs are non-empty strings;
 * IDs that name nothing surface as NotFound from the engine, not here.
 */
export const rpcParamSchemas = {
    create_page: z.object({
        parent_page_id: id,
        title: z.string(),
        slug: z.string().optional(),
        template: z.string().optional(),
        position: position.optional(),
        description: nullableText.optional(),
        keywords: nullableText.optional()
    }),
    update_page: z.object({
        page_id: id,
        title: z.string().optional(),
        template: z.string().optional(),
        description: nullableText.optional(),
        keywords: nullableText.optional()
    }),
    rename_page: z.object({ page_id: id, slug: z.string() }),
    move_page: z.object({
        page_id: id,
        new_parent_id: id,
        position: position.optional()
    }),
    delete_page: pageIdParams,
    get_page: pageIdParams,
    get_page_by_path: z.object({ path: z.string() }),
    list_pages: z.object({}),
    search_pages: z.object({ query: z.string() }),

    create_component: z.object({
        page_id: id,
        body: z.string(),
        title: nullableText.optional(),
        template: z.string().optional(),
        position: position.optional(),
        component_type: z.enum(COMPONENT_TYPES).optional()
    }),
    update_component: z.object({
        component_id: id,
        title: nullableText.optional(),
        body: z.string().optional(),
        template: z.string().optional()
    }),
    delete_component: componentIdParams,
    move_component: z.object({ component_id: id, position }),
    move_component_before: z.object({ component_id: id, before_component_id: id }),
    move_component_after: z.object({ component_id: id, after_component_id: id }),
    list_components: pageIdParams,
    get_component: componentIdParams,

    get_draft_content: pageIdParams,
    get_published_content: pageIdParams,
    get_draft_status: pageIdParams,
    publish_draft: pageIdParams,
    discard_draft: pageIdParams
};

export type RpcMethodName = keyof typeof rpcParamSchemas;

/**
 * JSON-RPC 2.0 request envelope. `params` is validated per method.
 */
export const rpcRequestSchema = z.object({
    jsonrpc: z.literal('2.0'),
    method: z.string().min(1),
    params: z.unknown().optional(),
    id: z.union([z.string(), z.number(), z.null()]).optional()
});
