import express, { Application } from 'express';
import morgan from 'morgan';
import { pathToFileURL } from 'node:url';
import { AppConfig, loadConfig } from './config.js';
import { loadPolicies, LoadResult } from './loader.js';
import { createApiRoutes } from './routes/api.js';

const MAX_BODY_SIZE = '5mb';

/**
 * Create and configure the Express application
 */
export function createApp(data: LoadResult, config: AppConfig): Application {
  const app = express();

  if (config.logRequests) {
    app.use(morgan('dev'));
  }

  // Policy documents arrive as plain text
  app.use(express.text({ type: 'text/*', limit: MAX_BODY_SIZE }));

  app.use('/api', createApiRoutes(data, {
    title: config.title,
    oscalVersion: config.oscalVersion
  }));

  // Health check
  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      documents: data.documents.size
    });
  });

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  return app;
}

/**
 * Start the server
 */
async function bootstrap() {
  const config = await loadConfig();

  const args = process.argv.slice(2);
  const portArg = args.find(a => a.startsWith('--port='));
  const port = portArg ? parseInt(portArg.split('=')[1], 10) : config.port;

  console.log(`Loading policies from: ${config.contentDir}`);
  const data = loadPolicies({
    contentDir: config.contentDir,
    parseOptions: { title: config.title }
  });

  console.log(`Loaded ${data.documents.size} of ${data.corpus.size} documents`);

  if (data.errors.length > 0) {
    console.warn('Warnings:', data.errors);
  }

  const app = createApp(data, config);

  const server = app.listen(port, () => {
    console.log(`Policy catalog API listening on http://localhost:${port}`);
  });

  // Graceful shutdown handler
  const shutdown = (signal: string) => {
    console.log(`\nReceived ${signal}, shutting down gracefully...`);

    server.close(() => {
      console.log('Server closed');
      process.exit(0);
    });

    // Force exit after 10 seconds
    setTimeout(() => {
      console.error('Forced shutdown after timeout');
      process.exit(1);
    }, 10000).unref();
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

// Only start listening when run directly, not when imported by tests
if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  bootstrap().catch(err => {
    console.error('Failed to start server:', err);
    process.exit(1);
  });
}
