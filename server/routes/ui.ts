import express from 'express';
import type { Express } from 'express';

/**
 * Static front page: a form that opens /progress and follows the done event
 */
export function setupUiRoutes(app: Express, publicDir: string) {
  app.use(express.static(publicDir, { index: 'index.html', maxAge: '1h' }));
}
