import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import type { CoachingResult, MatchRecord } from '@replay-coach/shared';

import { MatchStore } from '../src/db/matchStore.js';
import { CoachingInputs } from '../src/coach/coachingPrompt.js';
import { Coach, isPlayerNotFoundError, PlayerService, ReplaySource } from '../src/playerService.js';
import { silentLogger } from '../src/utils/logger.js';
import { makeHistory } from './fixtures.js';

class FakeReplaySource implements ReplaySource {
  calls: Array<{ playerName: string; numGames: number | undefined }> = [];

  constructor(private readonly histories: Record<string, MatchRecord[]>) {}

  async getPlayerMatchHistory(playerName: string, numGames?: number): Promise<MatchRecord[]> {
    this.calls.push({ playerName, numGames });
    return this.histories[playerName] ?? [];
  }
}

class FakeCoach implements Coach {
  inputs: CoachingInputs[] = [];

  async generateCoachingTips(inputs: CoachingInputs): Promise<CoachingResult> {
    this.inputs.push(inputs);
    return { status: 'ok', text: 'Boost less, rotate more.', model: 'test-model' };
  }
}

async function setup(histories: Record<string, MatchRecord[]>) {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'player-service-'));
  const store = await MatchStore.open(path.join(dir, 'rl_stats.db'), {
    logger: silentLogger,
    now: () => new Date('2024-05-01T00:00:00.000Z'),
  });
  const client = new FakeReplaySource(histories);
  const coach = new FakeCoach();
  const service = new PlayerService(client, store, coach, silentLogger);
  return { service, client, coach, store };
}

test('analyzePlayer fetches and stores a new player', async () => {
  const { service, client } = await setup({ Alpha: makeHistory(3) });

  const result = await service.analyzePlayer('Alpha');

  assert.deepEqual(client.calls, [{ playerName: 'Alpha', numGames: 20 }]);
  assert.deepEqual(result, {
    player: { name: 'Alpha', lastUpdated: '2024-05-01T00:00:00.000Z', totalGames: 3 },
    gamesAdded: 3,
    source: 'api',
  });
});

test('analyzePlayer serves a stored player without fetching unless refreshed', async () => {
  const { service, client } = await setup({ Alpha: makeHistory(3) });
  await service.analyzePlayer('Alpha', { numGames: 50 });

  const cached = await service.analyzePlayer('Alpha');
  assert.equal(cached.source, 'store');
  assert.equal(cached.gamesAdded, 0);
  assert.equal(client.calls.length, 1);

  const refreshed = await service.analyzePlayer('Alpha', { refresh: true, numGames: 10 });
  assert.equal(refreshed.source, 'api');
  assert.equal(refreshed.gamesAdded, 0);
  assert.deepEqual(client.calls[1], { playerName: 'Alpha', numGames: 10 });
});

test('analyzePlayer rejects an unknown player with no replays', async () => {
  const { service, store } = await setup({});
  await assert.rejects(service.analyzePlayer('Ghost'), isPlayerNotFoundError);
  assert.equal(store.playerExists('Ghost'), false);
});

test('getDashboard assembles analytics and holds back the comparison below 20 games', async () => {
  const { service } = await setup({ Alpha: makeHistory(3) });
  await service.analyzePlayer('Alpha');

  const dashboard = service.getDashboard('Alpha');

  assert.equal(dashboard.player.totalGames, 3);
  assert.deepEqual(Object.keys(dashboard.playlists), ['Ranked Doubles']);
  assert.deepEqual(dashboard.comparison, {});
  assert.equal(dashboard.trend.length, 3);
  assert.deepEqual(dashboard.scoreDistribution, [{ from: 300, to: 300, count: 3 }]);
  assert.equal(dashboard.radar.length, 5);
  // Three wins at one goal, assist and save per game with 33% shooting.
  assert.deepEqual(dashboard.quickTips, ["Great win rate! You're climbing steadily"]);
});

test('getDashboard includes the comparison from 20 games', async () => {
  const { service } = await setup({ Alpha: makeHistory(20) });
  await service.analyzePlayer('Alpha');

  const { comparison } = service.getDashboard('Alpha');

  assert.deepEqual(comparison, {
    early: { win_rate: 100, avg_goals: 1, avg_assists: 1, avg_saves: 1, avg_score: 300 },
    recent: { win_rate: 100, avg_goals: 1, avg_assists: 1, avg_saves: 1, avg_score: 300 },
    improvement: { win_rate_change: 0, goals_change: 0, assists_change: 0, saves_change: 0, score_change: 0 },
  });
});

test('getDashboard throws PlayerNotFoundError for an unknown player', async () => {
  const { service } = await setup({});
  assert.throws(() => service.getDashboard('Ghost'), isPlayerNotFoundError);
});

test('getCoaching hands the dashboard analytics to the coach', async () => {
  const { service, coach } = await setup({ Alpha: makeHistory(3) });
  await service.analyzePlayer('Alpha');

  const report = await service.getCoaching('Alpha');

  assert.deepEqual(report, {
    playerName: 'Alpha',
    coaching: { status: 'ok', text: 'Boost less, rotate more.', model: 'test-model' },
    quickTips: ["Great win rate! You're climbing steadily"],
  });
  assert.equal(coach.inputs.length, 1);
  assert.deepEqual(Object.keys(coach.inputs[0].playlists ?? {}), ['Ranked Doubles']);
});
