import express, { Express, Response } from 'express';
import cors from 'cors';
import crypto from 'node:crypto';
import { toBoundedInt } from './config.js';
import { isPlayerNotFoundError, PlayerService } from './playerService.js';
import { errorMessage, Logger } from './utils/logger.js';

export const MIN_NUM_GAMES = 5;
export const MAX_NUM_GAMES = 200;
export const DEFAULT_ANALYZE_GAMES = 20;

export interface AppOptions {
  corsOrigins: string[];
  logger: Logger;
}

/**
 * Trimmed player name, or undefined when it is empty, too long or carries control characters.
 */
export function validatePlayerName(raw: unknown): string | undefined {
  if (typeof raw !== 'string') return undefined;
  const s = raw.trim();
  if (s.length < 1 || s.length > 64) return undefined;
  if (!/^[^\p{C}]+$/u.test(s)) return undefined;
  return s;
}

function requestIdOf(res: Response): string | undefined {
  const id: unknown = res.locals.requestId;
  return typeof id === 'string' ? id : undefined;
}

export function createApp(service: PlayerService, opts: AppOptions): Express {
  const { logger, corsOrigins } = opts;
  const app = express();

  app.use(cors({
    origin: (origin, callback) => {
      // Non-browser clients send no Origin header.
      if (!origin) return callback(null, true);
      return callback(null, corsOrigins.includes(origin));
    },
  }));

  app.use(express.json());

  app.use((req, res, next) => {
    const headerId = req.headers['x-request-id'];
    const requestId = (typeof headerId === 'string' && headerId.trim()) ? headerId.trim() : crypto.randomUUID();
    res.locals.requestId = requestId;
    res.setHeader('x-request-id', requestId);

    const start = process.hrtime.bigint();
    res.on('finish', () => {
      const elapsedMs = Number(process.hrtime.bigint() - start) / 1_000_000;
      logger.info('request', {
        requestId,
        method: req.method,
        path: (req.originalUrl || req.url || '').split('?')[0],
        status: res.statusCode,
        durationMs: Math.round(elapsedMs),
      });
    });
    next();
  });

  const fail = (res: Response, msg: string, error: unknown, fields: Record<string, unknown> = {}) => {
    if (isPlayerNotFoundError(error)) {
      return res.status(404).json({ error: error.message });
    }
    logger.error(msg, { requestId: requestIdOf(res), ...fields, error: errorMessage(error) });
    return res.status(500).json({ error: msg });
  };

  app.get('/api/health', (req, res) => {
    res.json({ status: 'ok', message: 'Replay coach API is running' });
  });

  app.get('/api/players', (req, res) => {
    try {
      res.json(service.listPlayers());
    } catch (error) {
      fail(res, 'Failed to list players', error);
    }
  });

  app.get('/api/players/:name', (req, res) => {
    const name = validatePlayerName(req.params.name);
    if (!name) return res.status(400).json({ error: 'Player name is invalid' });

    try {
      const player = service.getPlayer(name);
      res.json(player ? { exists: true, player } : { exists: false });
    } catch (error) {
      fail(res, 'Failed to look up player', error, { playerName: name });
    }
  });

  /**
   * POST /api/players/:name/analyze
   * Body: { numGames?: number (5–200, default 20), refresh?: boolean }
   */
  app.post('/api/players/:name/analyze', async (req, res) => {
    const name = validatePlayerName(req.params.name);
    if (!name) return res.status(400).json({ error: 'Player name is invalid' });

    const body: unknown = req.body;
    const numGamesRaw = typeof body === 'object' && body !== null && 'numGames' in body ? body.numGames : undefined;
    const refresh = typeof body === 'object' && body !== null && 'refresh' in body && body.refresh === true;
    const numGames = toBoundedInt(numGamesRaw, DEFAULT_ANALYZE_GAMES, MIN_NUM_GAMES, MAX_NUM_GAMES);

    try {
      res.json(await service.analyzePlayer(name, { numGames, refresh }));
    } catch (error) {
      fail(res, 'Failed to analyze player', error, { playerName: name });
    }
  });

  app.get('/api/players/:name/dashboard', (req, res) => {
    const name = validatePlayerName(req.params.name);
    if (!name) return res.status(400).json({ error: 'Player name is invalid' });

    try {
      res.json(service.getDashboard(name));
    } catch (error) {
      fail(res, 'Failed to build dashboard', error, { playerName: name });
    }
  });

  app.get('/api/players/:name/coaching', async (req, res) => {
    const name = validatePlayerName(req.params.name);
    if (!name) return res.status(400).json({ error: 'Player name is invalid' });

    try {
      const report = await service.getCoaching(name);
      res.json({ coaching: report.coaching, quickTips: report.quickTips });
    } catch (error) {
      fail(res, 'Failed to generate coaching', error, { playerName: name });
    }
  });

  return app;
}
