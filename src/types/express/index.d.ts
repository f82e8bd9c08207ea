// src/types/express/index.d.ts

// Import the original Request type so the augmentation below targets express
// eslint-disable-next-line @typescript-eslint/no-unused-vars
import { Request } from 'express';

declare global {
    namespace Express {
        export interface Request {
            /**
             * The request body exactly as received, captured once at pipeline entry.
             * Empty when the request carried no body.
             */
            rawBody?: Buffer;

            /** Identifier of the API operation this request is routed to, e.g. `estados.create`. */
            operationId?: string;
        }
    }
}

export {};
