import express from 'express';
import cors from 'cors';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import { info, error as logError } from './logging/logger.js';
import { createUiApiRouter, type UiApiDeps } from './routes/uiApi.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const WEB_DIST_PATH = join(__dirname, '..', 'web', 'dist');

export interface AppOptions extends UiApiDeps {
  /** Built control panel; defaults to web/dist */
  webDistPath?: string;
  logRequests?: boolean;
}

export function createApp(options: AppOptions): express.Express {
  const { webDistPath = WEB_DIST_PATH, logRequests = true } = options;
  const app = express();

  app.use(cors({
    origin: true,
    credentials: true,
  }));

  app.use(express.json({ limit: '1mb' }));

  // Request logging
  if (logRequests) {
    app.use((req, _res, next) => {
      if (req.path !== '/api/events' && req.path !== '/api/status' && req.path !== '/api/logs') {
        info(`${req.method} ${req.path}`, 'HTTP');
      }
      next();
    });
  }

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.use('/api', createUiApiRouter(options));

  // Serve static frontend in production
  app.use(express.static(webDistPath));

  // SPA fallback
  app.get('*', (req, res, next) => {
    if (req.path.startsWith('/api')) {
      next();
      return;
    }
    res.sendFile(join(webDistPath, 'index.html'), (err) => {
      if (err) {
        res.status(200).send(`
          <!DOCTYPE html>
          <html>
          <head><title>Profile Runner</title></head>
          <body>
            <h1>Profile Runner</h1>
            <p>Frontend not built. Run <code>npm run build:web</code> or <code>npm run dev:web</code></p>
            <p>API is available at <a href="/api/status">/api/status</a></p>
          </body>
          </html>
        `);
      }
    });
  });

  app.use('/api', (_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  // Error handling
  app.use((err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    logError(`Unhandled error: ${err.message}`, 'Server');
    if (err.stack) {
      console.error(err.stack);
    }
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}
