import type { MatchRecord, TeamColor } from '@replay-coach/shared';
import type { BallchasingReplayDetail, BallchasingReplayPlayer } from './ballchasingClient.js';

const TEAM_COLORS: readonly TeamColor[] = ['blue', 'orange'];

type Bag = Record<string, unknown>;

function isBag(v: unknown): v is Bag {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function bag(v: unknown): Bag {
  return isBag(v) ? v : {};
}

/**
 * Reads a numeric field, treating anything missing or non-numeric as 0.
 */
function num(source: Bag, key: string): number {
  const v = source[key];
  return typeof v === 'number' && Number.isFinite(v) ? v : 0;
}

function isRosterEntry(v: unknown): v is BallchasingReplayPlayer {
  return isBag(v);
}

function teamGoals(team: unknown): number {
  return num(bag(bag(bag(team).stats).core), 'goals');
}

function rosterOf(team: unknown): BallchasingReplayPlayer[] {
  const players = bag(team).players;
  return Array.isArray(players) ? players.filter(isRosterEntry) : [];
}

/**
 * Locates a roster entry by case-insensitive exact name, checking blue before orange.
 */
export function findPlayerInReplay(
  detail: BallchasingReplayDetail,
  playerName: string
): { player: BallchasingReplayPlayer; team: TeamColor } | undefined {
  const wanted = playerName.toLowerCase();
  for (const team of TEAM_COLORS) {
    const player = rosterOf(bag(detail)[team]).find(p => typeof p.name === 'string' && p.name.toLowerCase() === wanted);
    if (player) return { player, team };
  }
  return undefined;
}

/**
 * Extracts one player's statistical line from a replay detail payload.
 *
 * Returns `undefined` when the name is on neither roster.
 */
export function extractPlayerStats(detail: BallchasingReplayDetail, playerName: string): MatchRecord | undefined {
  const found = findPlayerInReplay(detail, playerName);
  if (!found) return undefined;

  const { player, team } = found;
  const stats = bag(player.stats);
  const core = bag(stats.core);
  const boost = bag(stats.boost);
  const movement = bag(stats.movement);
  const positioning = bag(stats.positioning);

  const raw = bag(detail);
  const blueGoals = teamGoals(raw.blue);
  const orangeGoals = teamGoals(raw.orange);
  const won = team === 'blue' ? blueGoals > orangeGoals : orangeGoals > blueGoals;

  const playlist = raw.playlist_name;

  return {
    replayId: typeof raw.id === 'string' ? raw.id : '',
    date: typeof raw.date === 'string' ? raw.date : '',
    duration: num(raw, 'duration'),
    playlist: typeof playlist === 'string' && playlist !== '' ? playlist : null,
    playerName: typeof player.name === 'string' ? player.name : playerName,
    team,
    won,

    goals: num(core, 'goals'),
    assists: num(core, 'assists'),
    saves: num(core, 'saves'),
    shots: num(core, 'shots'),
    score: num(core, 'score'),
    shootingPercentage: num(core, 'shooting_percentage'),

    boostCollected: num(boost, 'bcpm'),
    boostStolen: num(boost, 'stolen'),
    boostUsedWhileSupersonic: num(boost, 'used_while_supersonic'),

    avgSpeed: num(movement, 'avg_speed'),
    timeSupersonic: num(movement, 'time_supersonic_speed'),

    timeDefensiveThird: num(positioning, 'time_defensive_third'),
    timeNeutralThird: num(positioning, 'time_neutral_third'),
    timeOffensiveThird: num(positioning, 'time_offensive_third'),
  };
}
