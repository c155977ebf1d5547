import express from 'express';
import cors from 'cors';
import { RenderService } from './services/RenderService.js';
import { loadConfig, type ServerConfig } from './config.js';
import type { NoteQuery, RenderResult } from './types.js';

function queryString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function sendWav(res: express.Response, result: Extract<RenderResult, { success: true }>): void {
  res.setHeader('Content-Type', 'audio/wav');
  res.setHeader('X-Sample-Count', String(result.sampleCount));
  res.setHeader('X-Duration-Seconds', result.duration.toFixed(3));
  res.send(Buffer.from(result.wav.buffer, result.wav.byteOffset, result.wav.byteLength));
}

function errorStatus(error: unknown): number {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return 500;
}

export function createApp(config: ServerConfig = loadConfig()): express.Express {
  const app = express();
  const renderService = new RenderService(config);

  app.use(cors());

  // Render a single note as WAV
  app.get('/api/note', (req, res) => {
    try {
      const query: NoteQuery = {
        key: queryString(req.query.key),
        accidental: queryString(req.query.accidental),
        octave: queryString(req.query.octave),
        duration: queryString(req.query.duration),
      };

      console.log(`Rendering note: ${JSON.stringify(query)}`);
      const result = renderService.renderNote(query);
      if (!result.success) {
        res.status(400).json({ error: result.error });
        return;
      }
      sendWav(res, result);
    } catch (error) {
      console.error('Note render error:', error);
      res.status(500).json({ error: 'Render failed' });
    }
  });

  // Render a CSV score as WAV
  app.post(
    '/api/score',
    express.text({ type: ['text/csv', 'text/plain'], limit: config.maxScoreBytes }),
    (req, res) => {
      try {
        const body: unknown = req.body;
        if (typeof body !== 'string') {
          res.status(400).json({ error: 'Expected a text/csv or text/plain body' });
          return;
        }

        console.log(`Rendering score (${body.length} chars)`);
        const result = renderService.renderScore(body);
        if (!result.success) {
          res.status(400).json({ error: result.error });
          return;
        }
        sendWav(res, result);
      } catch (error) {
        console.error('Score render error:', error);
        res.status(500).json({ error: 'Render failed' });
      }
    }
  );

  // Health check
  app.get('/health', (req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // Body parser failures (oversized or undecodable scores)
  app.use((error: unknown, req: express.Request, res: express.Response, next: express.NextFunction) => {
    if (res.headersSent) {
      next(error);
      return;
    }
    const status = errorStatus(error);
    if (status >= 500) {
      console.error('Request error:', error);
    }
    const message = status === 413 ? 'Score too large' : 'Request failed';
    res.status(status).json({ error: message });
  });

  return app;
}
