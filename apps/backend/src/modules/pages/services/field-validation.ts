import { ValidationError } from '../../../lib/errors.js';

export const MAX_TEMPLATE_LENGTH = 50;
export const MAX_TITLE_LENGTH = 255;
export const MAX_DESCRIPTION_LENGTH = 500;
export const MAX_KEYWORDS_LENGTH = 255;
export const MAX_BODY_BYTES = 1024 * 1024;

export const DEFAULT_TEMPLATE = 'default';

/**
 * Reject templates that are blank or longer than {@link MAX_TEMPLATE_LENGTH}.
 */
export function assertTemplate(template: string): void {
    if (template.trim().length === 0) {
        throw new ValidationError('Template must not be empty', { field: 'template' });
    }
    if (template.length > MAX_TEMPLATE_LENGTH) {
        throw new ValidationError(`Template must be at most ${MAX_TEMPLATE_LENGTH} characters`, {
            field: 'template',
            length: template.length
        });
    }
}

export function assertTitle(title: string | null): void {
    if (title !== null && title.length > MAX_TITLE_LENGTH) {
        throw new ValidationError(`Title must be at most ${MAX_TITLE_LENGTH} characters`, {
            field: 'title',
            length: title.length
        });
    }
}

export function assertDescription(description: string | null): void {
    if (description !== null && description.length > MAX_DESCRIPTION_LENGTH) {
        throw new ValidationError(`Description must be at most ${MAX_DESCRIPTION_LENGTH} characters`, {
            field: 'description',
            length: description.length
        });
    }
}

export function assertKeywords(keywords: string | null): void {
    if (keywords !== null && keywords.length > MAX_KEYWORDS_LENGTH) {
        throw new ValidationError(`Keywords must be at most ${MAX_KEYWORDS_LENGTH} characters`, {
            field: 'keywords',
            length: keywords.length
        });
    }
}

/**
 * Bodies are measured in UTF-8 bytes, matching what ends up in storage.
 */
export function assertBody(body: string): void {
    const bytes = Buffer.byteLength(body, 'utf8');
    if (bytes > MAX_BODY_BYTES) {
        throw new ValidationError(`Body must be at most ${MAX_BODY_BYTES} bytes`, {
            field: 'body',
            bytes
        });
    }
}
