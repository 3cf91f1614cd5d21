import type { IPage } from './IPage.js';

/**
 * Case-insensitive substring search over page metadata and published content.
 */
export interface IPageSearchService {
    /**
     * @param query - Search text, trimmed before matching
     * @returns Matching pages sorted by title
     * @throws ValidationError if the query is blank
     */
    search(query: string): IPage[];
}
