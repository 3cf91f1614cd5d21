import type { IPageRecord } from './IPage.js';

/**
 * Events emitted by the page tree after a structural change has been
 * persisted and applied in memory.
 */
export type PageEventType = 'after:create' | 'after:update' | 'after:move' | 'after:delete';

/**
 * Payload delivered to page event subscribers.
 */
export interface IPageEvent {
    type: PageEventType;

    /**
     * The page the operation targeted, in its post-operation state
     * (pre-deletion state for `after:delete`).
     */
    page: IPageRecord;

    /**
     * IDs of every page removed by the operation: the target and all of its
     * descendants. Only set for `after:delete`.
     */
    removedPageIds?: string[];

    timestamp: Date;
}

/**
 * Subscriber callback. Runs synchronously inside the operation that emitted
 * the event, so it must not perform I/O.
 */
export type PageEventSubscriber = (event: IPageEvent) => void;
