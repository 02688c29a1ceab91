import test from 'node:test';
import assert from 'node:assert/strict';
import type { SummaryStats } from '@replay-coach/shared';

import {
  comparePerformance,
  DEFAULT_STRENGTH,
  DEFAULT_WEAKNESS,
  performanceTrend,
  recentForm,
  ROLLING_WINDOW,
  scoreDistribution,
  statsByPlaylist,
  statsRadar,
  strengthsAndWeaknesses,
  summaryStats,
} from '../src/analysis/performanceAnalysis.js';
import { makeHistory, makeRecord } from './fixtures.js';

test('summaryStats aggregates wins, means and bests', () => {
  const records = [
    makeRecord({ won: true, goals: 2, assists: 0, saves: 1, shots: 4, score: 400, shootingPercentage: 50 }),
    makeRecord({ won: false, goals: 0, assists: 2, saves: 3, shots: 2, score: 200, shootingPercentage: 0 }),
    makeRecord({ won: true, goals: 1, assists: 1, saves: 0, shots: 2, score: 300, shootingPercentage: 50 }),
    makeRecord({ won: true, goals: 3, assists: 1, saves: 0, shots: 4, score: 500, shootingPercentage: 75 }),
  ];

  assert.deepEqual(summaryStats(records), {
    total_games: 4,
    wins: 3,
    losses: 1,
    win_rate: 75,
    avg_goals: 1.5,
    avg_assists: 1,
    avg_saves: 1,
    avg_shots: 3,
    avg_score: 350,
    avg_shooting_pct: 43.75,
    best_goals: 3,
    best_assists: 2,
    best_saves: 3,
    best_score: 500,
  });
});

test('empty input gives empty results everywhere', () => {
  assert.deepEqual(summaryStats([]), {});
  assert.deepEqual(statsByPlaylist([]), {});
  assert.deepEqual(recentForm([]), {});
  assert.deepEqual(comparePerformance([]), {});
  assert.deepEqual(strengthsAndWeaknesses([]), {});
  assert.deepEqual(performanceTrend([]), []);
  assert.deepEqual(scoreDistribution([]), []);
  assert.deepEqual(statsRadar({}), []);
});

test('statsByPlaylist groups in first-seen order and ignores missing playlists', () => {
  const records = [
    makeRecord({ playlist: 'Ranked Doubles', won: true, goals: 2 }),
    makeRecord({ playlist: null }),
    makeRecord({ playlist: 'Ranked Duels', won: false }),
    makeRecord({ playlist: 'Ranked Doubles', won: false, goals: 0 }),
  ];

  const byPlaylist = statsByPlaylist(records);

  assert.deepEqual(Object.keys(byPlaylist), ['Ranked Doubles', 'Ranked Duels']);
  assert.deepEqual(byPlaylist['Ranked Doubles'], {
    games: 2,
    win_rate: 50,
    avg_goals: 1,
    avg_assists: 1,
    avg_saves: 1,
    avg_score: 300,
  });
  assert.deepEqual(statsByPlaylist([makeRecord({ playlist: null })]), {});
});

test('recentForm covers only the newest games', () => {
  const records = [
    makeRecord({ won: true, goals: 3 }),
    makeRecord({ won: false, goals: 1 }),
    makeRecord({ won: true, goals: 0 }),
  ];

  assert.deepEqual(recentForm(records, 2), {
    games: 2,
    wins: 1,
    win_rate: 50,
    avg_goals: 2,
    avg_assists: 1,
    avg_saves: 1,
    avg_score: 300,
  });
  assert.equal(recentForm(records, 10).games, 3);
});

test('recentForm falls back to ten games for a non-finite count', () => {
  const records = makeHistory(12);
  assert.equal(recentForm(records, NaN).games, 10);
  assert.equal(recentForm(records, Infinity).games, 10);
  assert.deepEqual(recentForm(records, 0), {});
});

test('comparePerformance contrasts the oldest and newest windows', () => {
  // 25 games: the oldest ten lose with one goal, the newest ten win with two.
  const records = makeHistory(25, i =>
    i < 10 ? { won: false, goals: 1 } : i >= 15 ? { won: true, goals: 2 } : { won: true, goals: 0 }
  );

  const comparison = comparePerformance(records, 10, 10);

  assert.deepEqual(comparison, {
    early: { win_rate: 0, avg_goals: 1, avg_assists: 1, avg_saves: 1, avg_score: 300 },
    recent: { win_rate: 100, avg_goals: 2, avg_assists: 1, avg_saves: 1, avg_score: 300 },
    improvement: { win_rate_change: 100, goals_change: 1, assists_change: 0, saves_change: 0, score_change: 0 },
  });
});

test('comparePerformance needs enough games and positive windows', () => {
  assert.deepEqual(comparePerformance(makeHistory(19), 10, 10), {});
  assert.deepEqual(comparePerformance(makeHistory(20), 0, 10), {});
  assert.deepEqual(comparePerformance(makeHistory(10), 0, 5), {});
  assert.deepEqual(comparePerformance(makeHistory(20), NaN, 10), {});
  assert.notDeepEqual(comparePerformance(makeHistory(20), 10, 10), {});
});

test('strengthsAndWeaknesses classifies against the thresholds', () => {
  const records = [
    makeRecord({ goals: 2, assists: 0, saves: 1, shootingPercentage: 45 }),
    makeRecord({ goals: 2, assists: 0, saves: 1, shootingPercentage: 45 }),
  ];

  assert.deepEqual(strengthsAndWeaknesses(records), {
    strengths: ['Goal scoring', 'Shot accuracy'],
    weaknesses: ['Playmaking'],
    metrics: { goals: 2, assists: 0, saves: 1, shooting_pct: 45 },
  });
});

test('strengthsAndWeaknesses falls back to the defaults', () => {
  const result = strengthsAndWeaknesses([makeRecord({ goals: 1, assists: 1, saves: 1, shootingPercentage: 30 })]);
  assert.deepEqual(result, {
    strengths: [DEFAULT_STRENGTH],
    weaknesses: [DEFAULT_WEAKNESS],
    metrics: { goals: 1, assists: 1, saves: 1, shooting_pct: 30 },
  });
});

test('performanceTrend runs oldest first with trailing means', () => {
  const records = makeHistory(3, i => ({ goals: i + 1, score: (i + 1) * 100 }));

  const trend = performanceTrend(records, 2);

  assert.deepEqual(trend.map(p => p.replayId), ['r1', 'r2', 'r3']);
  assert.deepEqual(trend.map(p => p.rolling_goals), [1, 1.5, 2.5]);
  assert.deepEqual(trend.map(p => p.rolling_score), [100, 150, 250]);
});

test('performanceTrend defaults to a five-game window with one-sample minimum', () => {
  const trend = performanceTrend(makeHistory(7, i => ({ goals: i + 1 })));

  assert.equal(ROLLING_WINDOW, 5);
  assert.deepEqual(trend.map(p => p.rolling_goals), [1, 1.5, 2, 2.5, 3, 4, 5]);
});

test('scoreDistribution bins scores evenly and puts the maximum in the last bin', () => {
  const records = [0, 50, 100].map(score => makeRecord({ score }));

  assert.deepEqual(scoreDistribution(records, 4), [
    { from: 0, to: 25, count: 1 },
    { from: 25, to: 50, count: 0 },
    { from: 50, to: 75, count: 1 },
    { from: 75, to: 100, count: 1 },
  ]);
});

test('scoreDistribution collapses identical scores into one bin', () => {
  const records = [makeRecord({ score: 200 }), makeRecord({ score: 200 })];
  assert.deepEqual(scoreDistribution(records), [{ from: 200, to: 200, count: 2 }]);
});

test('statsRadar scales to 0-10 and caps', () => {
  const summary: SummaryStats = {
    total_games: 10,
    wins: 5,
    losses: 5,
    win_rate: 50,
    avg_goals: 1.5,
    avg_assists: 6,
    avg_saves: 1,
    avg_shots: 4,
    avg_score: 450,
    avg_shooting_pct: 37.5,
    best_goals: 4,
    best_assists: 8,
    best_saves: 3,
    best_score: 900,
  };

  assert.deepEqual(statsRadar(summary), [
    { axis: 'Goals', value: 3 },
    { axis: 'Assists', value: 10 },
    { axis: 'Saves', value: 2 },
    { axis: 'Shots', value: 2 },
    { axis: 'Score/100', value: 4.5 },
  ]);
});
