/**
 * Pages module public API.
 */
export { PagesModule } from './PagesModule.js';
export type { IPagesModuleDependencies } from './PagesModule.js';
export { ContentEngine } from './services/content-engine.js';
export type { IContentEngineOptions } from './services/content-engine.js';
export { PageTreeService } from './services/page-tree.service.js';
export { ComponentService, COMPONENT_TYPES } from './services/component.service.js';
export { VersionService } from './services/version.service.js';
export { PageSearchService } from './services/page-search.service.js';
export { generateSlug, sanitizeSlug, isValidSlug, MAX_SLUG_LENGTH } from './services/slug-generator.js';
export { MemoryContentStore } from './services/stores/memory-content.store.js';
export { MongoContentStore } from './services/stores/mongo-content.store.js';
export { ContentRpcDispatcher, RPC_ERROR_CODES } from './api/rpc.dispatcher.js';
export type { JsonRpcResponse, JsonRpcSuccess, JsonRpcFailure } from './api/rpc.dispatcher.js';
export { PagesController } from './api/pages.controller.js';
export { createPagesRouter, createRpcRouter, handleRpcParseError } from './api/pages.routes.js';
