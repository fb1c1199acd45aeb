import type { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import hpp from 'hpp';
import type { AppConfig } from '../core/config.js';
import { API_KEY_HEADER } from './apiKey.js';

export function applySecurity(app: Express, corsOrigin: AppConfig['corsOrigin']) {
  app.use(helmet({
    contentSecurityPolicy: process.env.NODE_ENV === 'production' ? {
      useDefaults: true,
      directives: {
        'default-src': ["'self'"],
        'connect-src': ["'self'"],
        'script-src': ["'self'"],
        'style-src': ["'self'", "'unsafe-inline'"],
        'object-src': ["'none'"],
        'base-uri': ["'self'"],
        'frame-ancestors': ["'none'"],
      },
    } : false,
    frameguard: { action: 'deny' },
    referrerPolicy: { policy: 'no-referrer' },
    crossOriginEmbedderPolicy: false,
  }));
  // Repeated query keys collapse to the last value
  app.use(hpp());

  if (corsOrigin !== undefined) {
    app.use(cors({
      origin: corsOrigin,
      allowedHeaders: ['Content-Type', API_KEY_HEADER],
      exposedHeaders: ['Content-Disposition', 'x-request-id'],
    }));
  }
}
