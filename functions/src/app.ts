import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import * as functions from 'firebase-functions';
import { corsConfig, staticConfig } from './config';
import { errorHandler } from './middlewares/errorHandler';
import { requireHttps } from './middlewares/httpsOnly';
import { apiLimiter, externalApiLimiter } from './middlewares/rateLimit';
import { createAssistantRouter } from './routes/assistant';
import { createInteractionsRouter } from './routes/interactions';
import { createMedicinesRouter } from './routes/medicines';
import { createQueryRouter } from './routes/query';
import { createVoiceRouter } from './routes/voice';
import type { ServiceContainer } from './services/serviceContainer';
import { setupSentryErrorHandler } from './utils/sentry';

const resolveAllowedOrigins = (): string[] => {
  const allowedOrigins = corsConfig.allowedOrigins
    ? corsConfig.allowedOrigins.split(',').map((origin) => origin.trim()).filter(Boolean)
    : [];

  // In development, allow localhost and common development ports
  const devOrigins = corsConfig.isDevelopment
    ? ['http://localhost:3000', 'http://localhost:5173', 'http://localhost:8000']
    : [];

  return [...allowedOrigins, ...devOrigins];
};

/**
 * Build the Express app around an already-loaded service container.
 * The catalog must be loaded before this is called.
 */
export function createApp(services: ServiceContainer): express.Express {
  const app = express();

  app.set('trust proxy', true);
  app.use(requireHttps);

  const allAllowedOrigins = resolveAllowedOrigins();
  if (allAllowedOrigins.length === 0) {
    functions.logger.warn(
      '[cors] No ALLOWED_ORIGINS configured. API will reject all CORS requests from browsers.',
    );
  }

  app.use(cors({
    origin: (origin, callback) => {
      // Allow requests with no origin (curl, server-to-server)
      if (!origin || allAllowedOrigins.includes(origin)) {
        callback(null, true);
        return;
      }

      functions.logger.warn(`[cors] Rejected request from unauthorized origin: ${origin}`);
      callback(new Error(`Origin ${origin} not allowed by CORS policy`));
    },
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type'],
  }));

  app.use(helmet({
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'self'"],
        scriptSrc: ["'self'"],
        connectSrc: ["'self'"],
        mediaSrc: ["'self'", 'blob:'],
        objectSrc: ["'none'"],
        frameSrc: ["'none'"],
      },
    },
    frameguard: { action: 'deny' },
    referrerPolicy: { policy: 'strict-origin-when-cross-origin' },
  }));

  // Voice page: index.html plus its script and stylesheet, which the CSP
  // requires to be same-origin files.
  app.use(express.static(staticConfig.publicDir, { index: 'index.html' }));

  app.use(express.json({ limit: '100kb' }));
  app.use(apiLimiter);

  app.use('/v1/query', createQueryRouter({ queryHandler: services.queryHandler }));
  app.use('/v1/medicines', createMedicinesRouter({
    catalog: services.data.catalog,
    lookupService: services.lookupService,
  }));
  app.use('/v1/interactions', createInteractionsRouter({ lookupService: services.lookupService }));
  app.use('/v1/voice', externalApiLimiter, createVoiceRouter({
    queryHandler: services.queryHandler,
    speechToText: services.speechToText,
    textToSpeech: services.textToSpeech,
  }));
  app.use('/v1/assistant', externalApiLimiter, createAssistantRouter({
    assistant: services.assistant,
  }));

  app.get('/health', (req, res) => {
    res.json({
      status: 'ok',
      medicines: services.data.catalog.size,
      timestamp: new Date().toISOString(),
    });
  });

  setupSentryErrorHandler(app);
  app.use(errorHandler);

  return app;
}
