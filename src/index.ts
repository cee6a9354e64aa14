import 'dotenv/config';
import express, { Request, Response } from 'express';
import helmet from 'helmet';
import cors from 'cors';
import { loadConfig, BotConfig } from './config';
import { logger } from './logger';
import { AppState, createAppState, handleHealth, handleWebhook, startCleanupTask } from './handlers';
import * as metrics from './metrics';
import {
  captureRawBody,
  errorRecoveryMiddleware,
  metricsMiddleware,
  requestLogMiddleware,
} from './middleware';

export function createApp(state: AppState): express.Express {
  const app = express();

  // Security middleware - helmet adds various security headers
  app.use(helmet({
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'none'"],
      },
    },
  }));

  // CORS - restrict to configured origins (default: none, the gateway calls server-to-server)
  const allowedOrigins = process.env.CORS_ALLOWED_ORIGINS?.split(',').filter(Boolean) || [];
  app.use(cors({
    origin: allowedOrigins.length > 0 ? allowedOrigins : false,
    methods: ['GET', 'POST'],
    allowedHeaders: ['Content-Type', 'X-Webhook-Hmac', 'X-Webhook-Hmac-Algorithm'],
  }));

  // Parse JSON bodies with size limit, keeping the raw bytes for HMAC verification
  app.use(express.json({ limit: '1mb', verify: captureRawBody }));

  // Metrics middleware (must be before request logging to capture all requests)
  app.use(metricsMiddleware);
  app.use(requestLogMiddleware);

  // Routes
  app.post('/webhook', async (req: Request, res: Response) => {
    await handleWebhook(req, res, state);
  });

  app.get('/health', (req: Request, res: Response) => {
    handleHealth(req, res, state);
  });

  app.get('/metrics', async (req: Request, res: Response) => {
    try {
      res.set('Content-Type', metrics.getContentType());
      res.send(await metrics.getMetrics());
    } catch (error) {
      logger.error('Metrics handler error', { error: String(error) });
      res.status(500).json({ error: 'internal server error' });
    }
  });

  // 404 handler
  app.use((req: Request, res: Response) => {
    res.status(404).json({ error: 'not found' });
  });

  app.use(errorRecoveryMiddleware);

  return app;
}

// Start the server
async function main(): Promise<void> {
  let config: BotConfig;
  try {
    config = loadConfig();
  } catch (error) {
    logger.error('Failed to load configuration', { error: String(error) });
    process.exit(1);
  }

  logger.setLevel(config.logLevel);

  logger.info('Starting quote relay', {
    port: config.port,
    gatewayUrl: config.gatewayUrl,
    session: config.gatewaySession,
    providerUrl: config.providerUrl,
    interval: config.quoteInterval,
    cacheTtlMs: config.cacheTtlMs,
    rateLimit: `${config.rateLimitMaxRequests}/${config.rateLimitWindowMs}ms`,
    unrecognizedReply: config.unrecognizedReply,
  });

  if (!config.providerCredentials) {
    logger.warn('No provider credentials configured, using anonymous access');
  }
  if (!config.webhookHmacKey) {
    logger.warn('WAHA_WEBHOOK_HMAC_KEY not set, webhook signatures are not verified');
  }

  const state = createAppState(config);
  const app = createApp(state);

  const cleanupTimer = startCleanupTask(state);

  const server = app.listen(config.port, () => {
    logger.info(`Quote relay listening on port ${config.port}`);
  });

  server.on('error', (error: Error) => {
    logger.error('HTTP server error', { error: error.message });
    process.exit(1);
  });

  // Graceful shutdown
  const shutdown = (signal: string): void => {
    logger.info(`Received ${signal}, shutting down gracefully`);
    clearInterval(cleanupTimer);

    server.close(() => {
      logger.info('HTTP server closed');
      process.exit(0);
    });

    // Force exit after 10 seconds
    setTimeout(() => {
      logger.error('Forced shutdown after timeout');
      process.exit(1);
    }, 10000).unref();
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

if (require.main === module) {
  main().catch((error: unknown) => {
    logger.error('Fatal error', { error: String(error) });
    process.exit(1);
  });
}
