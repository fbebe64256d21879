import express from 'express';
import type { Express } from 'express';
import cors from 'cors';
import swaggerUi from 'swagger-ui-express';
import type { Logger } from 'pino';
import type { MediaRepository } from './db/db.js';
import { createErrorHandler, notFoundHandler } from './errors.js';
import { requestLogger } from './logger.js';
import { buildOpenApiDocument } from './openapi.js';
import { mediaRouter } from './routes/media.js';

export interface AppDeps {
    repo: MediaRepository;
    logger: Logger;
}

export function createApp({ repo, logger }: AppDeps): Express {
    const app = express();
    app.use(requestLogger(logger));
    app.use(cors());
    app.use(express.json());

    const openApi = buildOpenApiDocument();

    // ---------- docs ----------

    app.get('/openapi.json', (_req, res) => {
        res.json(openApi);
    });
    app.use('/docs', swaggerUi.serve, swaggerUi.setup(openApi));
    app.get('/', (_req, res) => {
        res.redirect('/docs');
    });

    // ---------- media routes ----------

    app.use('/media', mediaRouter(repo));

    app.use(notFoundHandler);
    app.use(createErrorHandler(logger));

    return app;
}
