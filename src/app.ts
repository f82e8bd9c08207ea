// src/app.ts
import 'reflect-metadata'; // Must be imported first for class-transformer/validator
import express, { Express, Request, Response, NextFunction } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan'; // HTTP request logger
import httpStatus from 'http-status';
import { env } from '@/config';
import { errorHandler, errorConverter } from '@/middleware/error.middleware';
import { captureRawBody } from '@/middleware/body.middleware';
import { generalRateLimiter } from '@/middleware/rateLimit.middleware';
import ApiError from '@/utils/ApiError';
import logger from '@/utils/logger';

import userRoutes from '@/modules/users/user.routes';
import inventoryRoutes from '@/modules/inventory/inventory.routes';
import elementRoutes from '@/modules/elements/element.routes';
import reportRoutes from '@/modules/reports/reports.routes';
import catalogRoutes from '@/modules/catalogs/catalog.routes';

const app: Express = express();

// --- Security Middleware ---
app.set('trust proxy', 1);
app.use(helmet());

app.use(cors({
    origin: env.CORS_ORIGIN === '*' ? '*' : env.CORS_ORIGIN.split(','), // Allow multiple origins from env var
    methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization'],
}));
app.options('*', cors());

// --- Logging Middleware ---
// Direct morgan output to Winston's http level logger
const morganFormat = env.NODE_ENV === 'development' ? 'dev' : 'short';
app.use(morgan(morganFormat, {
    stream: { write: (message) => logger.http(message.trim()) },
    skip: () => env.NODE_ENV === 'test',
}));

// --- Body Capture ---
// The stream is read once here; validation and handlers decode req.rawBody instead of req.body
app.use(captureRawBody);

// --- API Routes ---
app.get('/health', (req: Request, res: Response) => {
    res.status(httpStatus.OK).json({ status: 'UP', timestamp: new Date().toISOString() });
});

const apiRouter = express.Router();

apiRouter.use('/usuarios', userRoutes);
apiRouter.use('/inventarios', inventoryRoutes);
apiRouter.use('/elementos', elementRoutes);
apiRouter.use('/reportes', reportRoutes);
// roles, tipos-documento, programas-formacion, fichas, generos, ciudades, centros, ambientes, estados, tipos-elemento
apiRouter.use('/', catalogRoutes);

app.use('/api/v1', generalRateLimiter, apiRouter);

// --- 404 Handler ---
app.use((req: Request, res: Response, next: NextFunction) => {
    next(new ApiError(httpStatus.NOT_FOUND, `Recurso no encontrado - ${req.originalUrl}`));
});

// --- Global Error Handling ---
app.use(errorConverter);
app.use(errorHandler);

export default app;
