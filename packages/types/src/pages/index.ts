/**
 * Page hierarchy type definitions.
 */

export type { IPageRecord, IPage, IPageNodeWithChildren } from './IPage.js';
export type { IPageCreateInput, IPageUpdateInput } from './IPageInput.js';
export type { PageEventType, IPageEvent, PageEventSubscriber } from './IPageEvent.js';
export type { IPageTreeService } from './IPageTreeService.js';
export type { IPageSearchService } from './IPageSearchService.js';
