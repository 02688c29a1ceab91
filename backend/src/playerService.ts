import type { CoachingReport, IngestResult, Player, PlayerDashboard } from '@replay-coach/shared';
import type { BallchasingClient } from './data/ballchasingClient.js';
import type { MatchStore } from './db/matchStore.js';
import type { AiCoach } from './coach/aiCoach.js';
import { generateQuickTips } from './coach/coachingPrompt.js';
import {
  comparePerformance,
  performanceTrend,
  recentForm,
  scoreDistribution,
  statsByPlaylist,
  statsRadar,
  strengthsAndWeaknesses,
  summaryStats,
} from './analysis/performanceAnalysis.js';
import { createLogger, Logger } from './utils/logger.js';

export const DEFAULT_NUM_GAMES = 20;
export const RECENT_FORM_GAMES = 10;
export const COMPARISON_WINDOW = 10;

export type ReplaySource = Pick<BallchasingClient, 'getPlayerMatchHistory'>;
export type PlayerStore = Pick<
  MatchStore,
  'playerExists' | 'getPlayer' | 'listPlayers' | 'upsertMatchHistory' | 'getPlayerStats'
>;
export type Coach = Pick<AiCoach, 'generateCoachingTips'>;

class PlayerNotFoundError extends Error {
  playerName: string;

  constructor(playerName: string, message: string) {
    super(message);
    this.name = 'PlayerNotFoundError';
    this.playerName = playerName;
  }
}

export function isPlayerNotFoundError(error: unknown): error is PlayerNotFoundError {
  return error instanceof PlayerNotFoundError;
}

export interface AnalyzeOptions {
  numGames?: number;
  /**
   * Pull from ballchasing even when the player is already stored.
   */
  refresh?: boolean;
}

export class PlayerService {
  private readonly logger: Logger;

  constructor(
    private readonly client: ReplaySource,
    private readonly store: PlayerStore,
    private readonly coach: Coach,
    logger?: Logger
  ) {
    this.logger = logger ?? createLogger('player-service');
  }

  listPlayers(): Player[] {
    return this.store.listPlayers();
  }

  getPlayer(name: string): Player | undefined {
    return this.store.getPlayer(name);
  }

  /**
   * Makes sure `name` has match history stored, fetching it when the player is
   * new or a refresh is asked for.
   */
  async analyzePlayer(name: string, opts: AnalyzeOptions = {}): Promise<IngestResult> {
    const numGames = opts.numGames ?? DEFAULT_NUM_GAMES;
    const stored = this.store.getPlayer(name);

    if (stored && !opts.refresh) {
      this.logger.info('Serving stored match history', { playerName: name, totalGames: stored.totalGames });
      return { player: stored, gamesAdded: 0, source: 'store' };
    }

    const history = await this.client.getPlayerMatchHistory(name, numGames);
    if (history.length === 0) {
      if (!stored) {
        throw new PlayerNotFoundError(name, `No replays found for ${name}. Try a different player name.`);
      }
      this.logger.warn('Refresh returned no replays; keeping stored history', { playerName: name });
      return { player: stored, gamesAdded: 0, source: 'api' };
    }

    const { player, gamesAdded } = this.store.upsertMatchHistory(name, history);
    return { player, gamesAdded, source: 'api' };
  }

  getDashboard(name: string): PlayerDashboard {
    const player = this.store.getPlayer(name);
    const records = player ? this.store.getPlayerStats(name) : [];
    if (!player || records.length === 0) {
      throw new PlayerNotFoundError(name, `No stored matches for ${name}. Analyze the player first.`);
    }

    const summary = summaryStats(records);
    return {
      player,
      summary,
      playlists: statsByPlaylist(records),
      recentForm: recentForm(records, RECENT_FORM_GAMES),
      comparison:
        records.length >= COMPARISON_WINDOW * 2 ? comparePerformance(records, COMPARISON_WINDOW, COMPARISON_WINDOW) : {},
      strengths: strengthsAndWeaknesses(records),
      trend: performanceTrend(records),
      scoreDistribution: scoreDistribution(records),
      radar: statsRadar(summary),
      quickTips: generateQuickTips(summary),
    };
  }

  async getCoaching(name: string): Promise<CoachingReport> {
    const dashboard = this.getDashboard(name);
    const coaching = await this.coach.generateCoachingTips({
      summary: dashboard.summary,
      recentForm: dashboard.recentForm,
      strengths: dashboard.strengths,
      playlists: dashboard.playlists,
    });
    if (coaching.status !== 'ok') {
      this.logger.info('AI coaching not produced', { playerName: name, status: coaching.status });
    }
    return { playerName: dashboard.player.name, coaching, quickTips: dashboard.quickTips };
  }
}
