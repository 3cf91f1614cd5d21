import type { IPage, IPageSearchService, IPageTreeService, IVersionService } from '@quire/types';
import { ValidationError } from '../../../lib/errors.js';

/**
 * Case-insensitive substring search over page metadata and published content.
 *
 * Draft content is never searched; only what a visitor could see counts.
 */
export class PageSearchService implements IPageSearchService {
    constructor(
        private readonly pageTree: IPageTreeService,
        private readonly versions: IVersionService
    ) {}

    /**
     * @throws {ValidationError} When the query is blank
     */
    search(query: string): IPage[] {
        const needle = query.trim().toLowerCase();
        if (needle.length === 0) {
            throw new ValidationError('Search query must not be empty', { field: 'query' });
        }

        return this.pageTree
            .listAll()
            .filter(page => this.haystack(page).some(text => text.toLowerCase().includes(needle)))
            .sort((a, b) => a.title.localeCompare(b.title) || a.path.localeCompare(b.path));
    }

    private haystack(page: IPage): string[] {
        const fields = [page.title, page.slug, page.description ?? '', page.keywords ?? ''];
        for (const component of this.versions.getPublished(page._id)) {
            fields.push(component.title ?? '', component.body);
        }
        return fields;
    }
}
