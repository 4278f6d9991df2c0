import express, { type ErrorRequestHandler } from 'express';
import cors from 'cors';
import listingsRouter from './routes/listings.js';
import { getEnv } from './env.js';

// express.json() rejects unparseable bodies with a SyntaxError before any route runs.
const handleMalformedJson: ErrorRequestHandler = (err, _req, res, next) => {
  if (err instanceof SyntaxError) {
    res.status(400).json({ error: 'VALIDATION_ERROR', message: 'Request body is not valid JSON' });
    return;
  }
  next(err);
};

export function createApp() {
  const env = getEnv();

  const normalizeOrigin = (value: string) => value.trim().replace(/\/+$/, '');
  const allowedOrigins = (env.CORS_ORIGIN ? env.CORS_ORIGIN.split(',') : [])
    .map((o) => o.trim())
    .filter(Boolean)
    .map(normalizeOrigin);

  const app = express();
  app.use(express.json({ limit: '100kb' }));

  app.use(
    cors({
      origin: (origin, callback) => {
        // Non-browser requests (curl/health checks) may omit Origin.
        if (!origin) return callback(null, true);

        // Unconfigured means any origin, which is what local development wants.
        if (allowedOrigins.length === 0) return callback(null, true);

        return callback(null, allowedOrigins.includes(normalizeOrigin(origin)));
      }
    })
  );

  app.get('/health', (_req, res) => res.json({ ok: true }));

  app.use(listingsRouter);
  app.use(handleMalformedJson);

  return app;
}
