/// <reference types="vitest" />

import { describe, it, expect, vi } from 'vitest';
import type { NextFunction, Request, Response } from 'express';
import { z } from 'zod';
import { errorHandler, notFoundHandler } from '../error-handler.js';
import {
    CycleDetectedError,
    InvalidOperationError,
    NotFoundError,
    SlugConflictError,
    ValidationError
} from '../../../lib/errors.js';

function createMockResponse() {
    const res = {
        status: vi.fn().mockReturnThis(),
        json: vi.fn().mockReturnThis()
    };
    return { res, response: res as unknown as Response };
}

const request = { id: 'req-1', method: 'GET', path: '/api/missing' } as unknown as Request;
const next: NextFunction = vi.fn();

describe('errorHandler', () => {
    it.each([
        { error: new NotFoundError('Page not found: x', { pageId: 'x' }), status: 404, code: 'NOT_FOUND' },
        { error: new ValidationError('Title too long'), status: 400, code: 'VALIDATION_ERROR' },
        { error: new InvalidOperationError('Cannot delete the root page'), status: 422, code: 'INVALID_OPERATION' },
        { error: new CycleDetectedError('Cycle'), status: 409, code: 'CYCLE_DETECTED' },
        { error: new SlugConflictError('Taken'), status: 409, code: 'SLUG_CONFLICT' }
    ])('should answer $status for $code', ({ error, status, code }) => {
        const { res, response } = createMockResponse();

        errorHandler(error, request, response, next);

        expect(res.status).toHaveBeenCalledWith(status);
        expect(res.json).toHaveBeenCalledWith({
            success: false,
            error: error.message,
            code,
            details: error.details
        });
    });

    it('should answer 400 for schema failures', () => {
        const { res, response } = createMockResponse();
        const result = z.object({ path: z.string() }).safeParse({});
        if (result.success) {
            throw new Error('Expected the schema to reject the input');
        }

        errorHandler(result.error, request, response, next);

        expect(res.status).toHaveBeenCalledWith(400);
        expect(res.json).toHaveBeenCalledWith(
            expect.objectContaining({ code: 'VALIDATION_ERROR', error: 'Invalid request payload' })
        );
    });

    it('should hide the message of unexpected errors', () => {
        const { res, response } = createMockResponse();

        errorHandler(new Error('connection string leaked'), request, response, next);

        expect(res.status).toHaveBeenCalledWith(500);
        expect(res.json).toHaveBeenCalledWith({
            success: false,
            error: 'Internal server error',
            code: 'INTERNAL_ERROR',
            details: undefined
        });
    });
});

describe('notFoundHandler', () => {
    it('should name the unmatched route', () => {
        const { res, response } = createMockResponse();

        notFoundHandler(request, response);

        expect(res.status).toHaveBeenCalledWith(404);
        expect(res.json).toHaveBeenCalledWith({
            success: false,
            error: 'Route not found: GET /api/missing',
            code: 'NOT_FOUND'
        });
    });
});
