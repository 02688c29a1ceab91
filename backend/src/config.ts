import { isLogLevel, LogLevel } from './utils/logger.js';

export const DEFAULT_BALLCHASING_BASE_URL = 'https://ballchasing.com/api';
export const DEFAULT_COACH_BASE_URL = 'https://api.groq.com/openai/v1';
export const DEFAULT_COACH_MODEL = 'llama-3.3-70b-versatile';

export interface BallchasingConfig {
  apiKey: string;
  baseUrl: string;
  /**
   * Fixed delay between replay-detail requests.
   */
  pacingMs: number;
}

export interface CoachConfig {
  /**
   * Empty when coaching is not configured; the coach then reports itself unavailable.
   */
  apiKey: string;
  baseUrl: string;
  model: string;
}

export interface AppConfig {
  ballchasing: BallchasingConfig;
  coach: CoachConfig;
  databasePath: string;
  port: number;
  corsOrigins: string[];
  logLevel: LogLevel;
}

export function toBoundedInt(v: unknown, fallback: number, min: number, max: number): number {
  const n = typeof v === 'number' ? v : typeof v === 'string' ? parseInt(v, 10) : NaN;
  if (!Number.isFinite(n)) return fallback;
  return Math.max(min, Math.min(max, Math.floor(n)));
}

function str(v: string | undefined, fallback: string): string {
  const s = v?.replace(/[\n\r]/g, '').trim();
  return s ? s : fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const logLevel = env.LOG_LEVEL?.trim().toLowerCase();

  return {
    ballchasing: {
      apiKey: str(env.BALLCHASING_API_KEY, ''),
      baseUrl: str(env.BALLCHASING_BASE_URL, DEFAULT_BALLCHASING_BASE_URL).replace(/\/+$/, ''),
      pacingMs: toBoundedInt(env.REQUEST_PACING_MS, 500, 0, 60_000),
    },
    coach: {
      apiKey: str(env.GROQ_API_KEY, ''),
      baseUrl: str(env.COACH_BASE_URL, DEFAULT_COACH_BASE_URL),
      model: str(env.COACH_MODEL, DEFAULT_COACH_MODEL),
    },
    databasePath: str(env.DATABASE_PATH, 'data/rl_stats.db'),
    port: toBoundedInt(env.PORT, 3001, 0, 65_535),
    corsOrigins: str(env.CORS_ORIGINS, 'http://localhost:5173')
      .split(',')
      .map(s => s.trim())
      .filter(Boolean),
    logLevel: isLogLevel(logLevel) ? logLevel : 'info',
  };
}
