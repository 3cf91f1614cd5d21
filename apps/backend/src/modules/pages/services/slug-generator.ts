/**
 * Slug generation for page path segments.
 *
 * Slugs are lower-case ASCII alphanumerics separated by single hyphens, at
 * most {@link MAX_SLUG_LENGTH} characters long, and unique among the siblings
 * they are generated for. Uniqueness is always scoped to one parent's current
 * children; the same slug may appear under different parents.
 */

export const MAX_SLUG_LENGTH = 100;

export const FALLBACK_SLUG = 'untitled';

const SLUG_PATTERN = /^[a-z0-9]([a-z0-9-]*[a-z0-9])?$/;

/**
 * Cut a sanitized slug to `maxLength` and drop any hyphen the cut leaves at the end.
 */
function truncateSlug(slug: string, maxLength: number): string {
    return slug.slice(0, maxLength).replace(/-+$/, '');
}

/**
 * Sanitize arbitrary text into a slug, without any uniqueness handling.
 *
 * Lower-cases the input, collapses every run of characters outside `[a-z0-9]`
 * into one hyphen, strips leading and trailing hyphens and truncates to the
 * maximum length. Input that leaves nothing behind becomes `untitled`.
 *
 * @example
 * sanitizeSlug("What's New? Price: $99.99!"); // 'what-s-new-price-99-99'
 * sanitizeSlug('!!!'); // 'untitled'
 */
export function sanitizeSlug(input: string): string {
    const slug = input
        .trim()
        .toLowerCase()
        .replace(/[^a-z0-9]+/g, '-')
        .replace(/^-+|-+$/g, '');

    if (slug.length === 0) {
        return FALLBACK_SLUG;
    }

    return truncateSlug(slug, MAX_SLUG_LENGTH);
}

/**
 * Whether a string is a well-formed slug.
 */
export function isValidSlug(slug: string): boolean {
    return slug.length <= MAX_SLUG_LENGTH && SLUG_PATTERN.test(slug);
}

/**
 * Generate a slug that no sibling already uses.
 *
 * The base comes from `explicitSlug` when it has any non-blank content and
 * from `title` otherwise. On collision the first free numeric suffix starting
 * at `-2` is appended; the base is shortened first whenever the suffix would
 * push the result past the maximum length.
 *
 * @param title - Page title the slug is derived from
 * @param explicitSlug - Caller-provided slug, sanitized the same way
 * @param siblingSlugs - Slugs of the target parent's current children
 * @returns Sanitized slug absent from `siblingSlugs`
 *
 * @example
 * generateSlug('About Us', undefined, new Set(['about-us'])); // 'about-us-2'
 */
export function generateSlug(
    title: string,
    explicitSlug: string | undefined,
    siblingSlugs: ReadonlySet<string>
): string {
    const source = explicitSlug !== undefined && explicitSlug.trim().length > 0 ? explicitSlug : title;
    const base = sanitizeSlug(source);

    if (!siblingSlugs.has(base)) {
        return base;
    }

    for (let counter = 2; ; counter++) {
        const suffix = `-${counter}`;
        const candidate = truncateSlug(base, MAX_SLUG_LENGTH - suffix.length) + suffix;
        if (!siblingSlugs.has(candidate)) {
            return candidate;
        }
    }
}
