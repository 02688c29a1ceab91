import axios, { AxiosAdapter, AxiosInstance } from 'axios';
import type { MatchRecord } from '@replay-coach/shared';
import type { BallchasingConfig } from '../config.js';
import { createLogger, errorMessage, Logger } from '../utils/logger.js';
import { extractPlayerStats, findPlayerInReplay } from './normalizer.js';

/**
 * Ballchasing REST payloads (subset of the fields this service reads).
 * Every field is optional: the API omits stats it could not compute.
 */

export interface BallchasingCoreStats {
  goals?: number;
  assists?: number;
  saves?: number;
  shots?: number;
  score?: number;
  shooting_percentage?: number;
}

export interface BallchasingPlayerStats {
  core?: BallchasingCoreStats;
  boost?: {
    bcpm?: number;
    stolen?: number;
    used_while_supersonic?: number;
  };
  movement?: {
    avg_speed?: number;
    time_supersonic_speed?: number;
  };
  positioning?: {
    time_defensive_third?: number;
    time_neutral_third?: number;
    time_offensive_third?: number;
  };
}

export interface BallchasingReplayPlayer {
  name?: string;
  stats?: BallchasingPlayerStats;
}

export interface BallchasingTeam {
  name?: string;
  players?: BallchasingReplayPlayer[];
  stats?: { core?: BallchasingCoreStats };
}

export interface BallchasingReplayDetail {
  id?: string;
  date?: string;
  duration?: number;
  playlist_name?: string | null;
  blue?: BallchasingTeam;
  orange?: BallchasingTeam;
}

export interface BallchasingReplaySummary {
  id: string;
  replay_title?: string;
  date?: string;
  playlist_name?: string;
}

export interface BallchasingReplayList {
  count?: number;
  list?: BallchasingReplaySummary[];
  next?: string;
}

export const MAX_SEARCH_COUNT = 200;

function isReplaySummary(v: unknown): v is BallchasingReplaySummary {
  return typeof v === 'object' && v !== null && 'id' in v && typeof v.id === 'string';
}

function describeRequestError(error: unknown): Record<string, unknown> {
  if (axios.isAxiosError(error)) {
    return { status: error.response?.status, code: error.code, error: error.message };
  }
  return { error: errorMessage(error) };
}

export interface BallchasingClientOptions {
  /**
   * Swaps the HTTP transport (tests use an in-process adapter).
   */
  adapter?: AxiosAdapter;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
  timeoutMs?: number;
}

/**
 * Client for the ballchasing.com replay API.
 *
 * Failures never throw out of the public methods: a failed search is an empty
 * list and a failed detail fetch is `undefined`, so one bad replay cannot
 * abort a batch.
 */
export class BallchasingClient {
  private readonly http: AxiosInstance;
  private readonly pacingMs: number;
  private readonly apiKey: string;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logger: Logger;

  constructor(config: BallchasingConfig, opts?: BallchasingClientOptions) {
    this.apiKey = config.apiKey;
    this.pacingMs = config.pacingMs;
    this.sleep = opts?.sleep ?? ((ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms)));
    this.logger = opts?.logger ?? createLogger('ballchasing');
    this.http = axios.create({
      baseURL: config.baseUrl,
      timeout: opts?.timeoutMs ?? 30_000,
      headers: { Authorization: config.apiKey },
      adapter: opts?.adapter,
    });
  }

  /**
   * Checks that the API is reachable and accepts the configured key.
   */
  async ping(): Promise<boolean> {
    try {
      await this.http.get('/');
      return true;
    } catch (error) {
      this.logger.warn('Ballchasing ping failed', describeRequestError(error));
      return false;
    }
  }

  /**
   * Searches replays uploaded with `playerName` on a roster, most recent first.
   */
  async searchReplays(playerName: string, count: number = 30): Promise<BallchasingReplaySummary[]> {
    if (!this.apiKey) {
      this.logger.error('BALLCHASING_API_KEY is not set; replay search skipped', { playerName });
      return [];
    }

    try {
      const response = await this.http.get<BallchasingReplayList>('/replays', {
        params: {
          'player-name': playerName,
          count: Math.max(1, Math.min(count, MAX_SEARCH_COUNT)),
          'sort-by': 'replay-date',
          'sort-dir': 'desc',
        },
      });
      const list = response.data?.list;
      const replays = Array.isArray(list) ? list.filter(isReplaySummary) : [];
      this.logger.info('Replay search complete', { playerName, found: replays.length });
      return replays;
    } catch (error) {
      this.logger.error('Error searching replays', { playerName, ...describeRequestError(error) });
      return [];
    }
  }

  async getReplayDetail(replayId: string): Promise<BallchasingReplayDetail | undefined> {
    try {
      const response = await this.http.get<BallchasingReplayDetail>(`/replays/${encodeURIComponent(replayId)}`);
      const data: unknown = response.data;
      if (typeof data !== 'object' || data === null || Array.isArray(data)) {
        this.logger.warn('Replay detail payload was not an object', { replayId });
        return undefined;
      }
      return response.data;
    } catch (error) {
      this.logger.error('Error fetching replay', { replayId, ...describeRequestError(error) });
      return undefined;
    }
  }

  extractPlayerStats(detail: BallchasingReplayDetail, playerName: string): MatchRecord | undefined {
    return extractPlayerStats(detail, playerName);
  }

  /**
   * Search, then fetch and extract each replay in turn.
   *
   * Detail requests are spaced `pacingMs` apart. Replays that fail to load or
   * that do not carry the exact requested name are skipped, so the result can
   * be shorter than `numGames`.
   */
  async getPlayerMatchHistory(playerName: string, numGames: number = 30): Promise<MatchRecord[]> {
    const replays = await this.searchReplays(playerName, numGames);
    if (replays.length === 0) {
      this.logger.warn('No replays found', { playerName });
      return [];
    }

    const history: MatchRecord[] = [];

    for (const [i, replay] of replays.entries()) {
      if (i > 0 && this.pacingMs > 0) await this.sleep(this.pacingMs);

      this.logger.debug('Processing replay', { playerName, replayId: replay.id, index: i + 1, of: replays.length });
      const detail = await this.getReplayDetail(replay.id);
      if (!detail) continue;

      // Search matches names loosely; only keep replays with this exact player.
      if (!findPlayerInReplay(detail, playerName)) {
        this.logger.info('Skipping replay without exact player name', { playerName, replayId: replay.id });
        continue;
      }

      const record = this.extractPlayerStats(detail, playerName);
      if (!record) {
        this.logger.warn('Player not found in replay', { playerName, replayId: replay.id });
        continue;
      }
      history.push(record.replayId ? record : { ...record, replayId: replay.id });
    }

    this.logger.info('Match history retrieved', { playerName, requested: numGames, retrieved: history.length });
    return history;
  }
}
