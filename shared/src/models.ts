export type TeamColor = 'blue' | 'orange';

export interface Player {
  name: string;
  lastUpdated: string;
  totalGames: number;
}

/**
 * One player's statistical line from one replay.
 *
 * Numeric fields are zero when the replay payload omits them.
 */
export interface MatchRecord {
  replayId: string;
  date: string;
  duration: number;
  playlist: string | null;
  playerName: string;
  team: TeamColor;
  won: boolean;

  goals: number;
  assists: number;
  saves: number;
  shots: number;
  score: number;
  shootingPercentage: number; // 0 to 100

  boostCollected: number; // per minute
  boostStolen: number;
  boostUsedWhileSupersonic: number;

  avgSpeed: number;
  timeSupersonic: number;

  timeDefensiveThird: number;
  timeNeutralThird: number;
  timeOffensiveThird: number;
}

export interface SummaryStats {
  total_games: number;
  wins: number;
  losses: number;
  win_rate: number; // 0 to 100
  avg_goals: number;
  avg_assists: number;
  avg_saves: number;
  avg_shots: number;
  avg_score: number;
  avg_shooting_pct: number;
  best_goals: number;
  best_assists: number;
  best_saves: number;
  best_score: number;
}

export interface PlaylistStats {
  games: number;
  win_rate: number; // 0 to 100
  avg_goals: number;
  avg_assists: number;
  avg_saves: number;
  avg_score: number;
}

export interface RecentForm {
  games: number;
  wins: number;
  win_rate: number; // 0 to 100
  avg_goals: number;
  avg_assists: number;
  avg_saves: number;
  avg_score: number;
}

export interface WindowStats {
  win_rate: number;
  avg_goals: number;
  avg_assists: number;
  avg_saves: number;
  avg_score: number;
}

export interface PerformanceComparison {
  early: WindowStats;
  recent: WindowStats;
  /**
   * recent - early, per metric.
   */
  improvement: {
    win_rate_change: number;
    goals_change: number;
    assists_change: number;
    saves_change: number;
    score_change: number;
  };
}

export interface StrengthsAndWeaknesses {
  strengths: string[];
  weaknesses: string[];
  /**
   * Per-game means the classification was made from.
   */
  metrics: {
    goals: number;
    assists: number;
    saves: number;
    shooting_pct: number;
  };
}

export interface TrendPoint extends MatchRecord {
  rolling_goals: number;
  rolling_assists: number;
  rolling_saves: number;
  rolling_score: number;
}

export interface ScoreBin {
  from: number;
  to: number;
  count: number;
}

export interface RadarAxis {
  axis: 'Goals' | 'Assists' | 'Saves' | 'Shots' | 'Score/100';
  value: number; // 0 to 10
}

/**
 * Empty object when the underlying dataset is too small (or empty).
 */
export type MaybeEmpty<T> = T | Record<string, never>;
