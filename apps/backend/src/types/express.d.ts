import 'express';

declare global {
    namespace Express {
        interface Request {
            /**
             * Correlation id assigned by the requestContext middleware.
             */
            id?: string;
        }
    }
}
