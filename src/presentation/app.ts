import express, { Application, Request, Response } from 'express';
import { Config } from '../config';
import { createMusicClient, MusicClient } from '../application/MusicClientFactory';
import { createCatalogRoutes } from './routes/catalogRoutes';
import { createSessionRoutes } from './routes/sessionRoutes';
import { errorHandler, NotFoundError } from './middleware/errorHandler';

/**
 * Creates and configures the Express application.
 * Pass `client` to reuse an existing session or to inject test doubles.
 */
export function createApp(config: Config, client: MusicClient = createMusicClient(config)): Application {
    const app = express();

    app.use(express.json());

    // Health check
    app.get('/health', (req: Request, res: Response) => {
        res.json({
            status: 'ok',
            timestamp: new Date().toISOString(),
            testMode: config.testMode,
        });
    });

    // Routes
    app.use(createCatalogRoutes(client.catalog));
    app.use(createSessionRoutes(client.session));

    app.use((req: Request) => {
        throw new NotFoundError(`No route for ${req.method} ${req.path}`);
    });

    // Error handler (must be last)
    app.use(errorHandler);

    return app;
}
