import express, { type Express, type RequestHandler } from 'express';
import type { Server } from 'http';

export interface ServerOptions {
    /** Telegram webhook middleware; it answers only POSTs to its own path. */
    webhook?: RequestHandler;
}

export function createServer(options: ServerOptions = {}): Express {
    const app = express();
    app.disable('x-powered-by');

    // Health check for the hosting platform
    app.get('/', (_req, res) => {
        res.type('text/plain').send('OK');
    });

    if (options.webhook) {
        app.use(options.webhook);
    }

    return app;
}

export function listen(app: Express, port: number, host = '0.0.0.0'): Promise<Server> {
    return new Promise((resolve, reject) => {
        const server = app.listen(port, host);
        server.once('listening', () => resolve(server));
        server.once('error', reject);
    });
}

export function closeServer(server: Server): Promise<void> {
    return new Promise((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
    });
}
