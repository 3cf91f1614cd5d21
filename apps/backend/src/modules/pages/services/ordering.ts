/**
 * Helpers for dense 0-based sibling ordering shared by pages and components.
 */

/**
 * Clamp a requested insertion index into `[0, length]`.
 *
 * Omitted positions append. Fractional values are truncated toward zero.
 */
export function clampPosition(position: number | undefined, length: number): number {
    if (position === undefined) {
        return length;
    }
    return Math.min(Math.max(Math.trunc(position), 0), length);
}

/**
 * Return a copy of `order` with `id` inserted at the clamped position.
 */
export function insertAt(order: readonly string[], id: string, position: number | undefined): string[] {
    const next = [...order];
    next.splice(clampPosition(position, order.length), 0, id);
    return next;
}

/**
 * Collect the records whose stored position no longer matches their index in `order`.
 *
 * Records already staged in `pending` are renumbered in place; others are
 * copied from `lookup` and staged. After the call every ID in `order` whose
 * position changed has an entry in `pending` carrying its new index.
 *
 * @param order - IDs in their new order
 * @param lookup - Current record for an ID
 * @param pending - Records staged for persistence, keyed by ID
 */
export function restage<T extends { position: number }>(
    order: readonly string[],
    lookup: (id: string) => T | undefined,
    pending: Map<string, T>
): void {
    order.forEach((id, index) => {
        const staged = pending.get(id);
        if (staged) {
            staged.position = index;
            return;
        }

        const current = lookup(id);
        if (current && current.position !== index) {
            pending.set(id, { ...current, position: index });
        }
    });
}
