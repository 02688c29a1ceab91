import type {
  Player,
  SummaryStats,
  PlaylistStats,
  RecentForm,
  PerformanceComparison,
  StrengthsAndWeaknesses,
  TrendPoint,
  ScoreBin,
  RadarAxis,
  MaybeEmpty,
} from './models.js';

export interface IngestResult {
  player: Player;
  /**
   * Rows actually inserted by this call; replays already stored for the player are not counted.
   */
  gamesAdded: number;
  /**
   * Whether match history was pulled from ballchasing or served from the local store.
   */
  source: 'api' | 'store';
}

export interface PlayerDashboard {
  player: Player;
  summary: MaybeEmpty<SummaryStats>;
  playlists: Record<string, PlaylistStats>;
  recentForm: MaybeEmpty<RecentForm>;
  /**
   * Early-vs-recent comparison; empty until the player has enough games stored.
   */
  comparison: MaybeEmpty<PerformanceComparison>;
  strengths: MaybeEmpty<StrengthsAndWeaknesses>;
  trend: TrendPoint[];
  scoreDistribution: ScoreBin[];
  radar: RadarAxis[];
  quickTips: string[];
}

export type CoachingResult =
  | { status: 'ok'; text: string; model: string }
  | { status: 'unavailable'; reason: string }
  | { status: 'failed'; error: string };

export interface CoachingReport {
  playerName: string;
  coaching: CoachingResult;
  quickTips: string[];
}

export * from './models.js';
