/// <reference types="vitest" />

import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { IPage } from '@quire/types';
import { ContentEngine } from '../services/content-engine.js';
import { MemoryContentStore } from '../services/stores/memory-content.store.js';
import { MAX_BODY_BYTES } from '../services/field-validation.js';
import { InvalidOperationError, NotFoundError, ValidationError } from '../../../lib/errors.js';
import { createMockLogger } from '../../../tests/vitest/mocks/logger.js';

describe('ComponentService', () => {
    let store: MemoryContentStore;
    let engine: ContentEngine;
    let page: IPage;

    beforeEach(async () => {
        store = new MemoryContentStore();
        engine = new ContentEngine({ store, logger: createMockLogger() });
        await engine.initialize();
        page = await engine.pages.create(engine.pages.getRoot()._id, { title: 'About' });
    });

    const bodies = (pageId: string) => engine.components.list(pageId).map(component => component.body);
    const positions = (pageId: string) => engine.components.list(pageId).map(component => component.position);

    describe('create', () => {
        it('should append with defaults', async () => {
            const component = await engine.components.create(page._id, { body: '# Hello' });

            expect(component.pageId).toBe(page._id);
            expect(component.position).toBe(0);
            expect(component.componentType).toBe('markdown');
            expect(component.template).toBe('default');
            expect(component.title).toBeNull();
        });

        it('should insert at a clamped position and renumber', async () => {
            await engine.components.create(page._id, { body: 'one' });
            await engine.components.create(page._id, { body: 'two' });
            await engine.components.create(page._id, { body: 'zero', position: -3 });
            await engine.components.create(page._id, { body: 'middle', position: 2 });
            await engine.components.create(page._id, { body: 'last', position: 100 });

            expect(bodies(page._id)).toEqual(['zero', 'one', 'middle', 'two', 'last']);
            expect(positions(page._id)).toEqual([0, 1, 2, 3, 4]);
        });

        it('should throw NotFoundError for an unknown page', async () => {
            await expect(engine.components.create('missing', { body: 'x' })).rejects.toBeInstanceOf(NotFoundError);
        });

        it('should validate fields', async () => {
            await expect(engine.components.create(page._id, { body: 'x', template: '' })).rejects.toBeInstanceOf(
                ValidationError
            );
            await expect(
                engine.components.create(page._id, { body: 'x', template: 't'.repeat(51) })
            ).rejects.toBeInstanceOf(ValidationError);
            await expect(
                engine.components.create(page._id, { body: 'x', title: 't'.repeat(256) })
            ).rejects.toBeInstanceOf(ValidationError);
            await expect(
                engine.components.create(page._id, { body: 'x'.repeat(MAX_BODY_BYTES + 1) })
            ).rejects.toBeInstanceOf(ValidationError);

            expect(engine.components.list(page._id)).toEqual([]);
        });

        it('should accept a body of exactly the maximum size', async () => {
            const component = await engine.components.create(page._id, { body: 'x'.repeat(MAX_BODY_BYTES) });

            expect(component.body).toHaveLength(MAX_BODY_BYTES);
        });
    });

    describe('get and update', () => {
        it('should return copies that do not alias stored state', async () => {
            const created = await engine.components.create(page._id, { body: 'original' });

            const copy = engine.components.get(created._id);
            copy.body = 'mutated';

            expect(engine.components.get(created._id).body).toBe('original');
        });

        it('should update only the supplied fields', async () => {
            const created = await engine.components.create(page._id, { body: 'body', title: 'Title', template: 'card' });

            const updated = await engine.components.update(created._id, { body: 'new body' });

            expect(updated.body).toBe('new body');
            expect(updated.title).toBe('Title');
            expect(updated.template).toBe('card');
        });

        it('should clear the title with null', async () => {
            const created = await engine.components.create(page._id, { body: 'body', title: 'Title' });

            const updated = await engine.components.update(created._id, { title: null });

            expect(updated.title).toBeNull();
        });

        it('should throw NotFoundError for unknown components', async () => {
            expect(() => engine.components.get('missing')).toThrow(NotFoundError);
            await expect(engine.components.update('missing', { body: 'x' })).rejects.toBeInstanceOf(NotFoundError);
        });
    });

    describe('delete', () => {
        it('should remove the component and close the gap', async () => {
            await engine.components.create(page._id, { body: 'a' });
            const b = await engine.components.create(page._id, { body: 'b' });
            await engine.components.create(page._id, { body: 'c' });

            await engine.components.delete(b._id);

            expect(bodies(page._id)).toEqual(['a', 'c']);
            expect(positions(page._id)).toEqual([0, 1]);
            const { components } = await store.load();
            expect(components.map(component => component.body).sort()).toEqual(['a', 'c']);
        });

        it('should throw NotFoundError for an unknown component', async () => {
            await expect(engine.components.delete('missing')).rejects.toBeInstanceOf(NotFoundError);
        });
    });

    describe('list', () => {
        it('should throw NotFoundError for an unknown page', () => {
            expect(() => engine.components.list('missing')).toThrow(NotFoundError);
        });

        it('should return an empty list for a page without components', () => {
            expect(engine.components.list(page._id)).toEqual([]);
        });
    });

    describe('reordering', () => {
        let ids: string[];

        beforeEach(async () => {
            ids = [];
            for (const body of ['a', 'b', 'c', 'd']) {
                ids.push((await engine.components.create(page._id, { body }))._id);
            }
        });

        it('should move a component to a position', async () => {
            const moved = await engine.components.move(ids[0], 2);

            expect(moved.position).toBe(2);
            expect(bodies(page._id)).toEqual(['b', 'c', 'a', 'd']);
            expect(positions(page._id)).toEqual([0, 1, 2, 3]);
        });

        it('should clamp move positions', async () => {
            await engine.components.move(ids[1], 50);

            expect(bodies(page._id)).toEqual(['a', 'c', 'd', 'b']);
        });

        it('should move a component before another', async () => {
            await engine.components.moveBefore(ids[3], ids[1]);

            expect(bodies(page._id)).toEqual(['a', 'd', 'b', 'c']);
        });

        it('should move a component after another', async () => {
            await engine.components.moveAfter(ids[0], ids[2]);

            expect(bodies(page._id)).toEqual(['b', 'c', 'a', 'd']);
        });

        it('should treat moving after the previous neighbour as a no-op', async () => {
            const saveComponents = vi.spyOn(store, 'saveComponents');

            const moved = await engine.components.moveAfter(ids[1], ids[0]);

            expect(moved.position).toBe(1);
            expect(saveComponents).not.toHaveBeenCalled();
        });

        it('should refuse to move a component relative to itself', async () => {
            await expect(engine.components.moveBefore(ids[0], ids[0])).rejects.toBeInstanceOf(InvalidOperationError);
        });

        it('should refuse anchors on another page', async () => {
            const other = await engine.pages.create(engine.pages.getRoot()._id, { title: 'Other' });
            const foreign = await engine.components.create(other._id, { body: 'x' });

            await expect(engine.components.moveAfter(ids[0], foreign._id)).rejects.toBeInstanceOf(
                InvalidOperationError
            );
        });

        it('should throw NotFoundError for a missing anchor', async () => {
            await expect(engine.components.moveBefore(ids[0], 'missing')).rejects.toBeInstanceOf(NotFoundError);
        });
    });

    describe('page deletion', () => {
        it('should drop the components of every removed page', async () => {
            const child = await engine.pages.create(page._id, { title: 'Child' });
            const own = await engine.components.create(page._id, { body: 'own' });
            const nested = await engine.components.create(child._id, { body: 'nested' });

            await engine.pages.delete(page._id);

            expect(() => engine.components.get(own._id)).toThrow(NotFoundError);
            expect(() => engine.components.get(nested._id)).toThrow(NotFoundError);
            expect((await store.load()).components).toEqual([]);
        });
    });

    it('should leave the draft unchanged when the store rejects a write', async () => {
        await engine.components.create(page._id, { body: 'a' });
        vi.spyOn(store, 'saveComponents').mockRejectedValueOnce(new Error('write failed'));

        await expect(engine.components.create(page._id, { body: 'b', position: 0 })).rejects.toThrow('write failed');

        expect(bodies(page._id)).toEqual(['a']);
        expect(positions(page._id)).toEqual([0]);
    });
});
