declare global {
    namespace Express {
        interface Request {
            /**
             * Correlation ID set by the request-context middleware.
             */
            id?: string;
        }
    }
}

export {};
