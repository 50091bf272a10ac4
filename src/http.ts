import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import type { RequestPipeline } from './pipeline/pipeline.js';
import { handleVoiceEvent } from './voice/handler.js';

export const SERVICE_NAME = 'overseerr-voice-request';
export const SERVICE_VERSION = '1.0.0';

/**
 * Voice-platform webhook: POST /voice takes the request envelope and answers
 * with the response envelope.
 */
export function createHttpApp(pipeline: RequestPipeline): Express {
  const app = express();
  app.use(express.json());

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', service: SERVICE_NAME, version: SERVICE_VERSION });
  });

  app.post('/voice', (req: Request, res: Response, next: NextFunction) => {
    handleVoiceEvent(pipeline, req.body)
      .then(response => res.json(response))
      .catch(next);
  });

  return app;
}
