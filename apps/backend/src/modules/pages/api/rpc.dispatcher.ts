import type { ILogger } from '@quire/types';
import { z, ZodError } from 'zod';
import { AppError, type ErrorKind } from '../../../lib/errors.js';
import type { ContentEngine } from '../services/content-engine.js';
import { rpcParamSchemas, rpcRequestSchema, type RpcMethodName } from './rpc.schemas.js';
import { serializeComponent, serializeDraftStatus, serializePage, serializePageTree } from './serializers.js';

export type JsonRpcId = string | number | null;

export interface JsonRpcErrorObject {
    code: number;
    message: string;
    data?: {
        kind: ErrorKind;
        details?: unknown;
    };
}

export interface JsonRpcSuccess {
    jsonrpc: '2.0';
    id: JsonRpcId;
    result: unknown;
}

export interface JsonRpcFailure {
    jsonrpc: '2.0';
    id: JsonRpcId;
    error: JsonRpcErrorObject;
}

export type JsonRpcResponse = JsonRpcSuccess | JsonRpcFailure;

export const RPC_ERROR_CODES = {
    PARSE_ERROR: -32700,
    INVALID_REQUEST: -32600,
    METHOD_NOT_FOUND: -32601,
    INVALID_PARAMS: -32602,
    INTERNAL_ERROR: -32603,
    NOT_FOUND: -32001,
    INVALID_OPERATION: -32002,
    CYCLE_DETECTED: -32003,
    SLUG_CONFLICT: -32004
} as const;

const KIND_CODES: Record<ErrorKind, number> = {
    NotFound: RPC_ERROR_CODES.NOT_FOUND,
    InvalidOperation: RPC_ERROR_CODES.INVALID_OPERATION,
    CycleDetected: RPC_ERROR_CODES.CYCLE_DETECTED,
    SlugConflict: RPC_ERROR_CODES.SLUG_CONFLICT,
    ValidationError: RPC_ERROR_CODES.INVALID_PARAMS,
    Internal: RPC_ERROR_CODES.INTERNAL_ERROR
};

type RpcMethodHandler = (params: unknown) => Promise<unknown>;

/**
 * Bind a parameter schema to its handler so the handler sees parsed params.
 */
function defineMethod<S extends z.ZodTypeAny>(
    schema: S,
    run: (params: z.infer<S>) => unknown
): RpcMethodHandler {
    return async params => run(schema.parse(params ?? {}));
}

function isMethodName(name: string): name is RpcMethodName {
    return Object.prototype.hasOwnProperty.call(rpcParamSchemas, name);
}

function failure(id: JsonRpcId, error: JsonRpcErrorObject): JsonRpcFailure {
    return { jsonrpc: '2.0', id, error };
}

/**
 * Best-effort ID recovery from a request that failed envelope validation.
 */
function extractId(raw: unknown): JsonRpcId {
    if (typeof raw === 'object' && raw !== null && 'id' in raw) {
        const { id } = raw;
        if (typeof id === 'string' || typeof id === 'number') {
            return id;
        }
    }
    return null;
}

/**
 * Response for a body that was not valid JSON.
 */
export function parseErrorResponse(): JsonRpcFailure {
    return failure(null, { code: RPC_ERROR_CODES.PARSE_ERROR, message: 'Parse error' });
}

/**
 * JSON-RPC 2.0 front end for the content engine.
 *
 * Maps method names onto engine operations, validates params with zod and
 * turns engine errors into JSON-RPC error objects whose `data.kind` names the
 * failure. Requests without an `id` are notifications: they run, but produce
 * no response entry. Batches run in order, one request at a time.
 *
 * @example
 * ```typescript
 * const dispatcher = new ContentRpcDispatcher(engine, logger);
 * await dispatcher.dispatch({ jsonrpc: '2.0', id: 1, method: 'list_pages' });
 * // { jsonrpc: '2.0', id: 1, result: { id: '...', path: '/', children: [] ... } }
 * ```
 */
export class ContentRpcDispatcher {
    private readonly methods: Record<RpcMethodName, RpcMethodHandler>;

    constructor(
        private readonly engine: ContentEngine,
        private readonly logger: ILogger
    ) {
        this.methods = this.buildMethods();
    }

    /**
     * Handle a decoded request body: a single request or a batch.
     *
     * @returns The response, the list of batch responses, or `null` when
     * nothing needs to be sent back (a notification or an all-notification batch)
     */
    async dispatch(payload: unknown): Promise<JsonRpcResponse | JsonRpcResponse[] | null> {
        if (!Array.isArray(payload)) {
            return this.handleRequest(payload);
        }

        if (payload.length === 0) {
            return failure(null, { code: RPC_ERROR_CODES.INVALID_REQUEST, message: 'Invalid Request: empty batch' });
        }

        const responses: JsonRpcResponse[] = [];
        for (const entry of payload) {
            const response = await this.handleRequest(entry);
            if (response) {
                responses.push(response);
            }
        }
        return responses.length > 0 ? responses : null;
    }

    private async handleRequest(raw: unknown): Promise<JsonRpcResponse | null> {
        const parsed = rpcRequestSchema.safeParse(raw);
        if (!parsed.success) {
            return failure(extractId(raw), {
                code: RPC_ERROR_CODES.INVALID_REQUEST,
                message: 'Invalid Request'
            });
        }

        const { method, params, id } = parsed.data;
        const isNotification = id === undefined;
        const responseId = id ?? null;

        if (!isMethodName(method)) {
            return isNotification
                ? null
                : failure(responseId, { code: RPC_ERROR_CODES.METHOD_NOT_FOUND, message: `Method not found: ${method}` });
        }

        try {
            const result = await this.methods[method](params);
            return isNotification ? null : { jsonrpc: '2.0', id: responseId, result };
        } catch (error) {
            const rpcError = this.toRpcError(error, method);
            return isNotification ? null : failure(responseId, rpcError);
        }
    }

    private toRpcError(error: unknown, method: string): JsonRpcErrorObject {
        if (error instanceof ZodError) {
            this.logger.debug({ method, issues: error.issues }, 'RPC params rejected');
            return {
                code: RPC_ERROR_CODES.INVALID_PARAMS,
                message: 'Invalid params',
                data: { kind: 'ValidationError', details: error.flatten() }
            };
        }

        if (error instanceof AppError && error.kind !== 'Internal') {
            this.logger.debug({ method, code: error.code, message: error.message }, 'RPC call failed');
            const data: JsonRpcErrorObject['data'] = { kind: error.kind };
            if (error.details !== undefined) {
                data.details = error.details;
            }
            return { code: KIND_CODES[error.kind], message: error.message, data };
        }

        this.logger.error({ error, method }, 'RPC call failed with an internal error');
        return {
            code: RPC_ERROR_CODES.INTERNAL_ERROR,
            message: 'Internal error',
            data: { kind: 'Internal' }
        };
    }

    private buildMethods(): Record<RpcMethodName, RpcMethodHandler> {
        const { pages, components, versions, search } = this.engine;
        const s = rpcParamSchemas;

        return {
            create_page: defineMethod(s.create_page, async p =>
                serializePage(
                    await pages.create(p.parent_page_id, {
                        title: p.title,
                        slug: p.slug,
                        template: p.template,
                        position: p.position,
                        description: p.description,
                        keywords: p.keywords
                    })
                )
            ),
            update_page: defineMethod(s.update_page, async p =>
                serializePage(
                    await pages.update(p.page_id, {
                        title: p.title,
                        template: p.template,
                        description: p.description,
                        keywords: p.keywords
                    })
                )
            ),
            rename_page: defineMethod(s.rename_page, async p => serializePage(await pages.rename(p.page_id, p.slug))),
            move_page: defineMethod(s.move_page, async p =>
                serializePage(await pages.move(p.page_id, p.new_parent_id, p.position))
            ),
            delete_page: defineMethod(s.delete_page, async p => {
                await pages.delete(p.page_id);
                return { deleted: true };
            }),
            get_page: defineMethod(s.get_page, p => serializePage(pages.get(p.page_id))),
            get_page_by_path: defineMethod(s.get_page_by_path, p => serializePage(pages.getByPath(p.path))),
            list_pages: defineMethod(s.list_pages, () => serializePageTree(pages.listTree())),
            search_pages: defineMethod(s.search_pages, p => search.search(p.query).map(serializePage)),

            create_component: defineMethod(s.create_component, async p =>
                serializeComponent(
                    await components.create(p.page_id, {
                        body: p.body,
                        title: p.title,
                        template: p.template,
                        position: p.position,
                        componentType: p.component_type
                    })
                )
            ),
            update_component: defineMethod(s.update_component, async p =>
                serializeComponent(
                    await components.update(p.component_id, { title: p.title, body: p.body, template: p.template })
                )
            ),
            delete_component: defineMethod(s.delete_component, async p => {
                await components.delete(p.component_id);
                return { deleted: true };
            }),
            move_component: defineMethod(s.move_component, async p =>
                serializeComponent(await components.move(p.component_id, p.position))
            ),
            move_component_before: defineMethod(s.move_component_before, async p =>
                serializeComponent(await components.moveBefore(p.component_id, p.before_component_id))
            ),
            move_component_after: defineMethod(s.move_component_after, async p =>
                serializeComponent(await components.moveAfter(p.component_id, p.after_component_id))
            ),
            list_components: defineMethod(s.list_components, p => components.list(p.page_id).map(serializeComponent)),
            get_component: defineMethod(s.get_component, p => serializeComponent(components.get(p.component_id))),

            get_draft_content: defineMethod(s.get_draft_content, p =>
                versions.getDraft(p.page_id).map(serializeComponent)
            ),
            get_published_content: defineMethod(s.get_published_content, p =>
                versions.getPublished(p.page_id).map(serializeComponent)
            ),
            get_draft_status: defineMethod(s.get_draft_status, p => serializeDraftStatus(versions.getStatus(p.page_id))),
            publish_draft: defineMethod(s.publish_draft, async p =>
                serializeDraftStatus(await versions.publish(p.page_id))
            ),
            discard_draft: defineMethod(s.discard_draft, async p =>
                serializeDraftStatus(await versions.discardDraft(p.page_id))
            )
        };
    }
}
