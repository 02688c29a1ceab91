import type {
  MatchRecord,
  MaybeEmpty,
  PerformanceComparison,
  PlaylistStats,
  RadarAxis,
  RecentForm,
  ScoreBin,
  StrengthsAndWeaknesses,
  SummaryStats,
  TrendPoint,
  WindowStats,
} from '@replay-coach/shared';

/**
 * Every function here is pure and expects records in the order the match
 * store returns them: most recent first. Empty input gives an empty result.
 */

export const ROLLING_WINDOW = 5;
export const RECENT_FORM_DEFAULT = 10;

export const STRENGTH_THRESHOLDS = {
  goals: { strong: 1.5, weak: 0.8, label: 'Goal scoring' },
  assists: { strong: 1.2, weak: 0.6, label: 'Playmaking' },
  saves: { strong: 1.5, weak: 0.8, label: 'Defense' },
  shooting_pct: { strong: 40, weak: 25, label: 'Shot accuracy' },
} as const;

export const DEFAULT_STRENGTH = 'Consistent all-around player';
export const DEFAULT_WEAKNESS = 'Well-rounded performance';

type NumericField = 'goals' | 'assists' | 'saves' | 'shots' | 'score' | 'shootingPercentage';

function mean(records: readonly MatchRecord[], field: NumericField): number {
  if (records.length === 0) return 0;
  return records.reduce((acc, r) => acc + r[field], 0) / records.length;
}

function best(records: readonly MatchRecord[], field: NumericField): number {
  return records.reduce((acc, r) => Math.max(acc, r[field]), -Infinity);
}

function countWins(records: readonly MatchRecord[]): number {
  return records.filter(r => r.won).length;
}

function winRate(records: readonly MatchRecord[]): number {
  return records.length > 0 ? (countWins(records) / records.length) * 100 : 0;
}

export function isPopulated<T extends object>(value: MaybeEmpty<T>): value is T {
  return Object.keys(value).length > 0;
}

/**
 * Oldest first. Stable, so equal dates keep their incoming order.
 */
export function sortByDateAscending<T extends { date: string }>(records: readonly T[]): T[] {
  return [...records].sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
}

export function summaryStats(records: readonly MatchRecord[]): MaybeEmpty<SummaryStats> {
  if (records.length === 0) return {};

  const wins = countWins(records);
  return {
    total_games: records.length,
    wins,
    losses: records.length - wins,
    win_rate: (wins / records.length) * 100,
    avg_goals: mean(records, 'goals'),
    avg_assists: mean(records, 'assists'),
    avg_saves: mean(records, 'saves'),
    avg_shots: mean(records, 'shots'),
    avg_score: mean(records, 'score'),
    avg_shooting_pct: mean(records, 'shootingPercentage'),
    best_goals: best(records, 'goals'),
    best_assists: best(records, 'assists'),
    best_saves: best(records, 'saves'),
    best_score: best(records, 'score'),
  };
}

/**
 * Per-playlist aggregates. Rows without a playlist belong to no group.
 */
export function statsByPlaylist(records: readonly MatchRecord[]): Record<string, PlaylistStats> {
  const groups = new Map<string, MatchRecord[]>();
  for (const r of records) {
    if (!r.playlist) continue;
    const group = groups.get(r.playlist);
    if (group) group.push(r);
    else groups.set(r.playlist, [r]);
  }

  const out: Record<string, PlaylistStats> = {};
  for (const [playlist, group] of groups) {
    out[playlist] = {
      games: group.length,
      win_rate: winRate(group),
      avg_goals: mean(group, 'goals'),
      avg_assists: mean(group, 'assists'),
      avg_saves: mean(group, 'saves'),
      avg_score: mean(group, 'score'),
    };
  }
  return out;
}

/**
 * Aggregates over the `numGames` most recent games (or all of them when fewer are stored).
 */
export function recentForm(
  records: readonly MatchRecord[],
  numGames: number = RECENT_FORM_DEFAULT
): MaybeEmpty<RecentForm> {
  const n = Number.isFinite(numGames) ? Math.max(0, Math.floor(numGames)) : RECENT_FORM_DEFAULT;
  const recent = records.slice(0, n);
  if (recent.length === 0) return {};

  return {
    games: recent.length,
    wins: countWins(recent),
    win_rate: winRate(recent),
    avg_goals: mean(recent, 'goals'),
    avg_assists: mean(recent, 'assists'),
    avg_saves: mean(recent, 'saves'),
    avg_score: mean(recent, 'score'),
  };
}

function windowStats(records: readonly MatchRecord[]): WindowStats {
  return {
    win_rate: winRate(records),
    avg_goals: mean(records, 'goals'),
    avg_assists: mean(records, 'assists'),
    avg_saves: mean(records, 'saves'),
    avg_score: mean(records, 'score'),
  };
}

/**
 * Compares the earliest `firstN` games against the latest `lastN`.
 *
 * Empty unless at least `firstN + lastN` games are available. A window of
 * zero or less (or NaN) also gives an empty result.
 */
export function comparePerformance(
  records: readonly MatchRecord[],
  firstN: number = 10,
  lastN: number = 10
): MaybeEmpty<PerformanceComparison> {
  if (!Number.isFinite(firstN) || !Number.isFinite(lastN) || firstN <= 0 || lastN <= 0) return {};
  if (records.length < firstN + lastN) return {};

  const sorted = sortByDateAscending(records);
  const early = windowStats(sorted.slice(0, firstN));
  const recent = windowStats(sorted.slice(sorted.length - lastN));

  return {
    early,
    recent,
    improvement: {
      win_rate_change: recent.win_rate - early.win_rate,
      goals_change: recent.avg_goals - early.avg_goals,
      assists_change: recent.avg_assists - early.avg_assists,
      saves_change: recent.avg_saves - early.avg_saves,
      score_change: recent.avg_score - early.avg_score,
    },
  };
}

/**
 * Classifies per-game means against fixed thresholds.
 */
export function strengthsAndWeaknesses(records: readonly MatchRecord[]): MaybeEmpty<StrengthsAndWeaknesses> {
  if (records.length === 0) return {};

  const metrics: StrengthsAndWeaknesses['metrics'] = {
    goals: mean(records, 'goals'),
    assists: mean(records, 'assists'),
    saves: mean(records, 'saves'),
    shooting_pct: mean(records, 'shootingPercentage'),
  };

  const strengths: string[] = [];
  const weaknesses: string[] = [];

  for (const key of ['goals', 'assists', 'saves', 'shooting_pct'] as const) {
    const { strong, weak, label } = STRENGTH_THRESHOLDS[key];
    if (metrics[key] > strong) strengths.push(label);
    else if (metrics[key] < weak) weaknesses.push(label);
  }

  return {
    strengths: strengths.length > 0 ? strengths : [DEFAULT_STRENGTH],
    weaknesses: weaknesses.length > 0 ? weaknesses : [DEFAULT_WEAKNESS],
    metrics,
  };
}

/**
 * Oldest-first records with trailing rolling means (minimum one sample) for charting.
 */
export function performanceTrend(records: readonly MatchRecord[], window: number = ROLLING_WINDOW): TrendPoint[] {
  const size = Math.max(1, Math.floor(window));
  const sorted = sortByDateAscending(records);

  return sorted.map((r, i) => {
    const slice = sorted.slice(Math.max(0, i - size + 1), i + 1);
    return {
      ...r,
      rolling_goals: mean(slice, 'goals'),
      rolling_assists: mean(slice, 'assists'),
      rolling_saves: mean(slice, 'saves'),
      rolling_score: mean(slice, 'score'),
    };
  });
}

/**
 * Equal-width histogram of match score between the lowest and highest score.
 */
export function scoreDistribution(records: readonly MatchRecord[], binCount: number = 20): ScoreBin[] {
  if (records.length === 0) return [];

  const scores = records.map(r => r.score);
  const min = Math.min(...scores);
  const max = Math.max(...scores);
  if (min === max) return [{ from: min, to: max, count: scores.length }];

  const bins = Math.max(1, Math.floor(binCount));
  const width = (max - min) / bins;
  const counts = new Array<number>(bins).fill(0);
  for (const s of scores) {
    // The top edge belongs to the last bin.
    counts[Math.min(bins - 1, Math.floor((s - min) / width))]++;
  }

  return counts.map((count, i) => ({
    from: min + i * width,
    to: i === bins - 1 ? max : min + (i + 1) * width,
    count,
  }));
}

/**
 * Five-axis profile on a 0–10 scale, capped at 10.
 */
export function statsRadar(summary: MaybeEmpty<SummaryStats>): RadarAxis[] {
  if (!isPopulated<SummaryStats>(summary)) return [];
  const cap = (v: number) => Math.min(v, 10);

  return [
    { axis: 'Goals', value: cap(summary.avg_goals * 2) },
    { axis: 'Assists', value: cap(summary.avg_assists * 2) },
    { axis: 'Saves', value: cap(summary.avg_saves * 2) },
    { axis: 'Shots', value: cap(summary.avg_shots / 2) },
    { axis: 'Score/100', value: cap(summary.avg_score / 100) },
  ];
}
