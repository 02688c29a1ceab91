import type { MatchRecord } from '@replay-coach/shared';
import type { BallchasingReplayDetail } from '../src/data/ballchasingClient.js';

export function makeRecord(overrides: Partial<MatchRecord> = {}): MatchRecord {
  return {
    replayId: 'r1',
    date: '2024-01-01T00:00:00Z',
    duration: 300,
    playlist: 'Ranked Doubles',
    playerName: 'Alpha',
    team: 'blue',
    won: true,
    goals: 1,
    assists: 1,
    saves: 1,
    shots: 3,
    score: 300,
    shootingPercentage: 33,
    boostCollected: 0,
    boostStolen: 0,
    boostUsedWhileSupersonic: 0,
    avgSpeed: 0,
    timeSupersonic: 0,
    timeDefensiveThird: 0,
    timeNeutralThird: 0,
    timeOffensiveThird: 0,
    ...overrides,
  };
}

/**
 * `count` records one day apart, returned most recent first like the store does.
 * `at(i)` customises the i-th oldest game.
 */
export function makeHistory(count: number, at: (i: number) => Partial<MatchRecord> = () => ({})): MatchRecord[] {
  const records: MatchRecord[] = [];
  for (let i = 0; i < count; i++) {
    const day = String(i + 1).padStart(2, '0');
    records.push(makeRecord({ replayId: `r${i + 1}`, date: `2024-01-${day}T00:00:00Z`, ...at(i) }));
  }
  return records.reverse();
}

export function makeReplayDetail(opts: {
  id?: string;
  bluePlayer?: string;
  orangePlayer?: string;
  blueGoals?: number;
  orangeGoals?: number;
} = {}): BallchasingReplayDetail {
  return {
    id: opts.id,
    date: '2024-03-01T12:00:00Z',
    duration: 310,
    playlist_name: 'Ranked Duels',
    blue: {
      stats: { core: { goals: opts.blueGoals ?? 3 } },
      players: [
        {
          name: opts.bluePlayer ?? 'Alpha',
          stats: {
            core: { goals: 2, assists: 1, saves: 0, shots: 4, score: 450, shooting_percentage: 50 },
            boost: { bcpm: 400.5, stolen: 120, used_while_supersonic: 35 },
            movement: { avg_speed: 1500, time_supersonic_speed: 40 },
            positioning: { time_defensive_third: 100, time_neutral_third: 90, time_offensive_third: 80 },
          },
        },
      ],
    },
    orange: {
      stats: { core: { goals: opts.orangeGoals ?? 1 } },
      players: [{ name: opts.orangePlayer ?? 'Bravo', stats: { core: { goals: 1, saves: 5 } } }],
    },
  };
}
