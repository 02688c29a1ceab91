import sqlJs from 'sql.js';
import type { Database, ParamsObject, SqlJsStatic, SqlValue } from 'sql.js';
import fs from 'node:fs';
import path from 'node:path';
import type { MatchRecord, Player, TeamColor } from '@replay-coach/shared';
import { createLogger, errorMessage, Logger } from '../utils/logger.js';

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS players (
    player_id INTEGER PRIMARY KEY AUTOINCREMENT,
    player_name TEXT UNIQUE NOT NULL,
    last_updated TEXT,
    total_games INTEGER NOT NULL DEFAULT 0
  );

  CREATE TABLE IF NOT EXISTS match_history (
    match_id INTEGER PRIMARY KEY AUTOINCREMENT,
    player_id INTEGER NOT NULL REFERENCES players (player_id),
    replay_id TEXT NOT NULL,
    date TEXT NOT NULL DEFAULT '',
    duration REAL NOT NULL DEFAULT 0,
    playlist TEXT,
    player_name TEXT NOT NULL,
    team TEXT NOT NULL,
    won INTEGER NOT NULL,
    goals INTEGER NOT NULL DEFAULT 0,
    assists INTEGER NOT NULL DEFAULT 0,
    saves INTEGER NOT NULL DEFAULT 0,
    shots INTEGER NOT NULL DEFAULT 0,
    score INTEGER NOT NULL DEFAULT 0,
    shooting_percentage REAL NOT NULL DEFAULT 0,
    boost_collected REAL NOT NULL DEFAULT 0,
    boost_stolen REAL NOT NULL DEFAULT 0,
    boost_used_while_supersonic REAL NOT NULL DEFAULT 0,
    avg_speed REAL NOT NULL DEFAULT 0,
    time_supersonic REAL NOT NULL DEFAULT 0,
    time_defensive_third REAL NOT NULL DEFAULT 0,
    time_neutral_third REAL NOT NULL DEFAULT 0,
    time_offensive_third REAL NOT NULL DEFAULT 0,
    UNIQUE (player_id, replay_id)
  );

  CREATE INDEX IF NOT EXISTS idx_match_history_player_date ON match_history (player_id, date);
`;


const MATCH_COLUMNS = [
  'replay_id', 'date', 'duration', 'playlist', 'player_name', 'team', 'won',
  'goals', 'assists', 'saves', 'shots', 'score', 'shooting_percentage',
  'boost_collected', 'boost_stolen', 'boost_used_while_supersonic',
  'avg_speed', 'time_supersonic',
  'time_defensive_third', 'time_neutral_third', 'time_offensive_third',
] as const;

const PLAYER_COLUMNS = 'player_id, player_name, last_updated, total_games';

type Row = ParamsObject;

export interface UpsertResult {
  player: Player;
  gamesAdded: number;
}

export class MatchStoreError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MatchStoreError';
  }
}

export function isMatchStoreError(error: unknown): error is MatchStoreError {
  return error instanceof MatchStoreError;
}

let sqlJsReady: Promise<SqlJsStatic> | undefined;

/**
 * Loads the SQLite WASM module once per process.
 */
function loadSqlJs(): Promise<SqlJsStatic> {
  // The package is CommonJS; its initializer is also exposed as `default`.
  sqlJsReady ??= sqlJs.default();
  return sqlJsReady;
}

function queryAll(db: Database, sql: string, params: SqlValue[] = []): Row[] {
  const stmt = db.prepare(sql);
  try {
    stmt.bind(params);
    const rows: Row[] = [];
    while (stmt.step()) rows.push(stmt.getAsObject());
    return rows;
  } finally {
    stmt.free();
  }
}

function queryOne(db: Database, sql: string, params: SqlValue[] = []): Row | undefined {
  return queryAll(db, sql, params)[0];
}

function text(row: Row, key: string): string {
  const v = row[key];
  return typeof v === 'string' ? v : '';
}

function nullableText(row: Row, key: string): string | null {
  const v = row[key];
  return typeof v === 'string' ? v : null;
}

function num(row: Row, key: string): number {
  const v = row[key];
  return typeof v === 'number' ? v : 0;
}

function toTeamColor(team: string): TeamColor {
  return team === 'orange' ? 'orange' : 'blue';
}

function toPlayer(row: Row): Player {
  return {
    name: text(row, 'player_name'),
    lastUpdated: text(row, 'last_updated'),
    totalGames: num(row, 'total_games'),
  };
}

function toMatchRecord(row: Row): MatchRecord {
  return {
    replayId: text(row, 'replay_id'),
    date: text(row, 'date'),
    duration: num(row, 'duration'),
    playlist: nullableText(row, 'playlist'),
    playerName: text(row, 'player_name'),
    team: toTeamColor(text(row, 'team')),
    won: num(row, 'won') === 1,
    goals: num(row, 'goals'),
    assists: num(row, 'assists'),
    saves: num(row, 'saves'),
    shots: num(row, 'shots'),
    score: num(row, 'score'),
    shootingPercentage: num(row, 'shooting_percentage'),
    boostCollected: num(row, 'boost_collected'),
    boostStolen: num(row, 'boost_stolen'),
    boostUsedWhileSupersonic: num(row, 'boost_used_while_supersonic'),
    avgSpeed: num(row, 'avg_speed'),
    timeSupersonic: num(row, 'time_supersonic'),
    timeDefensiveThird: num(row, 'time_defensive_third'),
    timeNeutralThird: num(row, 'time_neutral_third'),
    timeOffensiveThird: num(row, 'time_offensive_third'),
  };
}

/**
 * Bind values in `MATCH_COLUMNS` order.
 */
function toMatchValues(m: MatchRecord): SqlValue[] {
  return [
    m.replayId, m.date, m.duration, m.playlist, m.playerName, m.team, m.won ? 1 : 0,
    m.goals, m.assists, m.saves, m.shots, m.score, m.shootingPercentage,
    m.boostCollected, m.boostStolen, m.boostUsedWhileSupersonic,
    m.avgSpeed, m.timeSupersonic,
    m.timeDefensiveThird, m.timeNeutralThird, m.timeOffensiveThird,
  ];
}

export interface MatchStoreOptions {
  logger?: Logger;
  now?: () => Date;
}

/**
 * SQLite-backed store of tracked players and their per-replay match lines.
 *
 * Each public call loads the database file into a fresh sql.js connection and
 * closes it before returning; writes are flushed back to the file on success.
 * Nothing is held between calls.
 */
export class MatchStore {
  private readonly logger: Logger;
  private readonly now: () => Date;

  private constructor(
    private readonly sql: SqlJsStatic,
    private readonly dbPath: string,
    opts?: MatchStoreOptions
  ) {
    this.logger = opts?.logger ?? createLogger('match-store');
    this.now = opts?.now ?? (() => new Date());
  }

  /**
   * Opens (creating if needed) the store at `dbPath` and applies the schema.
   */
  static async open(dbPath: string, opts?: MatchStoreOptions): Promise<MatchStore> {
    const store = new MatchStore(await loadSqlJs(), dbPath, opts);
    try {
      fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
    } catch (error) {
      throw new MatchStoreError(`Could not create directory for ${dbPath}: ${errorMessage(error)}`, { cause: error });
    }
    store.withConnection(db => db.exec(SCHEMA), { write: true });
    return store;
  }

  private withConnection<T>(fn: (db: Database) => T, opts?: { write?: boolean }): T {
    let db: Database;
    try {
      db = fs.existsSync(this.dbPath) ? new this.sql.Database(fs.readFileSync(this.dbPath)) : new this.sql.Database();
    } catch (error) {
      throw new MatchStoreError(`Could not open match store at ${this.dbPath}: ${errorMessage(error)}`, { cause: error });
    }

    try {
      db.run('PRAGMA foreign_keys = ON');
      const result = fn(db);
      if (opts?.write) fs.writeFileSync(this.dbPath, db.export());
      return result;
    } catch (error) {
      if (error instanceof MatchStoreError) throw error;
      throw new MatchStoreError(`Match store operation failed: ${errorMessage(error)}`, { cause: error });
    } finally {
      db.close();
    }
  }

  playerExists(name: string): boolean {
    return this.withConnection(db => {
      const row = queryOne(db, 'SELECT COUNT(*) AS n FROM players WHERE player_name = ?', [name]);
      return row !== undefined && num(row, 'n') > 0;
    });
  }

  getPlayer(name: string): Player | undefined {
    return this.withConnection(db => {
      const row = queryOne(db, `SELECT ${PLAYER_COLUMNS} FROM players WHERE player_name = ?`, [name]);
      return row ? toPlayer(row) : undefined;
    });
  }

  /**
   * Most recently updated first.
   */
  listPlayers(): Player[] {
    return this.withConnection(db =>
      queryAll(db, `SELECT ${PLAYER_COLUMNS} FROM players ORDER BY last_updated DESC, player_name ASC`).map(toPlayer)
    );
  }

  /**
   * Stores a fetched batch for `name`, creating the player on first ingest.
   *
   * Replays already stored for this player are skipped (never overwritten).
   * `total_games` and `last_updated` are recomputed afterwards.
   */
  upsertMatchHistory(name: string, records: readonly MatchRecord[]): UpsertResult {
    const result = this.withConnection(
      (db): UpsertResult => {
        const stamp = this.now().toISOString();
        db.run('BEGIN');
        try {
          db.run('INSERT OR IGNORE INTO players (player_name, last_updated) VALUES (?, ?)', [name, stamp]);
          const player = queryOne(db, 'SELECT player_id FROM players WHERE player_name = ?', [name]);
          if (!player) {
            throw new MatchStoreError(`Player row missing after insert: ${name}`);
          }
          const playerId = num(player, 'player_id');

          const insert = db.prepare(`
            INSERT OR IGNORE INTO match_history (player_id, ${MATCH_COLUMNS.join(', ')})
            VALUES (?, ${MATCH_COLUMNS.map(() => '?').join(', ')})
          `);
          let gamesAdded = 0;
          try {
            for (const record of records) {
              insert.run([playerId, ...toMatchValues(record)]);
              gamesAdded += db.getRowsModified();
            }
          } finally {
            insert.free();
          }

          db.run(
            `UPDATE players
             SET last_updated = ?,
                 total_games = (SELECT COUNT(*) FROM match_history WHERE player_id = ?)
             WHERE player_id = ?`,
            [stamp, playerId, playerId]
          );

          const updated = queryOne(db, `SELECT ${PLAYER_COLUMNS} FROM players WHERE player_id = ?`, [playerId]);
          db.run('COMMIT');
          return {
            player: updated ? toPlayer(updated) : { name, lastUpdated: stamp, totalGames: 0 },
            gamesAdded,
          };
        } catch (error) {
          db.run('ROLLBACK');
          throw error;
        }
      },
      { write: true }
    );

    this.logger.info('Stored match history', {
      playerName: name,
      gamesAdded: result.gamesAdded,
      totalGames: result.player.totalGames,
    });
    return result;
  }

  /**
   * All stored match lines for `name`, most recent first.
   */
  getPlayerStats(name: string): MatchRecord[] {
    return this.withConnection(db =>
      queryAll(
        db,
        `SELECT ${MATCH_COLUMNS.map(c => `m.${c}`).join(', ')}
         FROM match_history m
         JOIN players p ON m.player_id = p.player_id
         WHERE p.player_name = ?
         ORDER BY m.date DESC, m.match_id ASC`,
        [name]
      ).map(toMatchRecord)
    );
  }
}
