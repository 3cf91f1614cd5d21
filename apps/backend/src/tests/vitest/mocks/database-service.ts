/**
 * In-memory IDatabaseService stand-in for Vitest.
 *
 * Collections keep plain documents in arrays and implement only the driver
 * calls the content store makes: `find().toArray()`, `bulkWrite` with
 * `replaceOne` upserts, `replaceOne`, `insertMany` and `deleteMany`. Filters
 * support equality (including ObjectId) and `$in`. `withTransaction` copies
 * every collection first and puts the copies back when the work rejects.
 *
 * @example
 * ```typescript
 * const database = createMockDatabaseService();
 * const store = new MongoContentStore(database, createMockLogger());
 * await store.savePages([root]);
 * expect(database.getCollectionData('pages')).toHaveLength(1);
 * ```
 */

import type { IDatabaseService } from '@quire/types';
import type { ClientSession, Collection, Document } from 'mongodb';
import { ObjectId } from 'mongodb';
import { vi } from 'vitest';

type StoredDocument = Record<string, unknown>;

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !(value instanceof ObjectId) && !(value instanceof Date);
}

function valuesEqual(left: unknown, right: unknown): boolean {
    if (left instanceof ObjectId && right instanceof ObjectId) {
        return left.equals(right);
    }
    return left === right;
}

export function matchesFilter(doc: StoredDocument, filter: StoredDocument): boolean {
    return Object.entries(filter).every(([key, condition]) => {
        const value = doc[key];
        if (isRecord(condition) && Array.isArray(condition.$in)) {
            return condition.$in.some(candidate => valuesEqual(value, candidate));
        }
        return valuesEqual(value, condition);
    });
}

export interface MockDatabaseService extends IDatabaseService {
    /**
     * Raw documents of a collection, for assertions.
     */
    getCollectionData(collectionName: string): StoredDocument[];

    /**
     * Make the next call of `operation` on a collection reject with `error`.
     */
    injectError(collectionName: string, operation: string, error: Error): void;

    clear(): void;
}

export function createMockDatabaseService(): MockDatabaseService {
    const collections = new Map<string, StoredDocument[]>();
    const injectedErrors = new Map<string, Error>();
    const indexes: Array<{ collectionName: string; indexSpec: unknown }> = [];

    function data(name: string): StoredDocument[] {
        const existing = collections.get(name);
        if (existing) {
            return existing;
        }
        const created: StoredDocument[] = [];
        collections.set(name, created);
        return created;
    }

    function checkInjectedError(name: string, operation: string): void {
        const key = `${name}:${operation}`;
        const error = injectedErrors.get(key);
        if (error) {
            injectedErrors.delete(key);
            throw error;
        }
    }

    function upsert(name: string, filter: StoredDocument, replacement: StoredDocument): void {
        const docs = data(name);
        const index = docs.findIndex(doc => matchesFilter(doc, filter));
        const _id = index === -1 ? filter._id ?? new ObjectId() : docs[index]._id;
        const next = { ...replacement, _id };
        if (index === -1) {
            docs.push(next);
        } else {
            docs[index] = next;
        }
    }

    function createCollection(name: string) {
        return {
            collectionName: name,
            find: (filter: StoredDocument = {}) => ({
                toArray: async () => {
                    checkInjectedError(name, 'find');
                    return data(name)
                        .filter(doc => matchesFilter(doc, filter))
                        .map(doc => ({ ...doc }));
                }
            }),
            bulkWrite: async (operations: Array<{ replaceOne?: { filter: StoredDocument; replacement: StoredDocument } }>) => {
                checkInjectedError(name, 'bulkWrite');
                for (const operation of operations) {
                    if (operation.replaceOne) {
                        upsert(name, operation.replaceOne.filter, operation.replaceOne.replacement);
                    }
                }
                return { ok: 1 };
            },
            replaceOne: async (filter: StoredDocument, replacement: StoredDocument) => {
                checkInjectedError(name, 'replaceOne');
                upsert(name, filter, replacement);
                return { acknowledged: true };
            },
            insertMany: async (docs: StoredDocument[]) => {
                checkInjectedError(name, 'insertMany');
                data(name).push(...docs.map(doc => ({ ...doc })));
                return { acknowledged: true, insertedCount: docs.length };
            },
            deleteMany: async (filter: StoredDocument) => {
                checkInjectedError(name, 'deleteMany');
                const docs = data(name);
                const kept = docs.filter(doc => !matchesFilter(doc, filter));
                collections.set(name, kept);
                return { acknowledged: true, deletedCount: docs.length - kept.length };
            }
        };
    }

    const collectionMocks = new Map<string, ReturnType<typeof createCollection>>();

    return {
        getCollection: <T extends Document = Document>(name: string): Collection<T> => {
            const existing = collectionMocks.get(name) ?? createCollection(name);
            collectionMocks.set(name, existing);
            // Only the subset above is implemented
            return existing as unknown as Collection<T>;
        },
        async withTransaction<T>(work: (session: ClientSession) => Promise<T>): Promise<T> {
            const before = new Map(
                [...collections].map(([name, docs]) => [name, docs.map(doc => ({ ...doc }))] as const)
            );
            // The fake collections ignore the session
            const session = {} as ClientSession;
            try {
                return await work(session);
            } catch (error) {
                collections.clear();
                for (const [name, docs] of before) {
                    collections.set(name, docs);
                }
                throw error;
            }
        },
        createIndex: vi.fn(async (collectionName: string, indexSpec: unknown) => {
            indexes.push({ collectionName, indexSpec });
        }),
        getCollectionData: (collectionName: string) => data(collectionName),
        injectError: (collectionName: string, operation: string, error: Error) => {
            injectedErrors.set(`${collectionName}:${operation}`, error);
        },
        clear: () => {
            collections.clear();
            injectedErrors.clear();
            indexes.length = 0;
        }
    };
}
