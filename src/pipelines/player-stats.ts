import { PlayerNameIndex } from "../identity/matcher";
import { scoreBatting, scorePitching, withDerivedSingles } from "../scoring/points";
import type {
  PlayerSeasonRecord,
  PlayerSeasonResult,
  RosterEntry,
  ScoringTables,
  StatRecord,
  StatRow,
} from "../types";
import { toStatNumber } from "../utils/number";

export interface PlayerSeasonInput {
  roster: readonly RosterEntry[];
  batting: readonly StatRow[];
  pitching: readonly StatRow[];
  tables: ScoringTables;
}

interface StatPool {
  index: PlayerNameIndex;
  rowsByName: Map<string, StatRow>;
}

/**
 * Attaches provider stats and fantasy points to every rostered player. A
 * player without a confident name match keeps an empty stat line and zero
 * points and is reported in `unmatched`; the rest of the roster is unaffected.
 */
export function buildPlayerSeasonStats(input: PlayerSeasonInput): PlayerSeasonResult {
  const battingPool = buildPool(input.batting);
  const pitchingPool = buildPool(input.pitching);

  if (battingPool.index.size === 0 && pitchingPool.index.size === 0) {
    return {
      players: input.roster.map((entry) => unmatchedRecord(entry)),
      unmatched: [],
      matchedCount: 0,
    };
  }

  const players: PlayerSeasonRecord[] = [];
  const unmatched: string[] = [];
  let matchedCount = 0;

  for (const entry of input.roster) {
    // Without a role there is no pool to search; the player is kept as is.
    if (entry.role === null) {
      players.push(unmatchedRecord(entry));
      continue;
    }

    const isBatter = entry.role === "batter";
    const pool = isBatter ? battingPool : pitchingPool;
    const matchedName = pool.index.match(entry.name);
    const row = matchedName === null ? undefined : pool.rowsByName.get(matchedName);

    if (!row || matchedName === null) {
      unmatched.push(`${entry.name} (${isBatter ? "B" : "P"})`);
      players.push(unmatchedRecord(entry));
      continue;
    }

    const statLine = isBatter ? withDerivedSingles(row.stats) : row.stats;
    players.push({
      ...entry,
      stats: toNumericStats(statLine),
      fantasyPoints: isBatter
        ? scoreBatting(statLine, input.tables.batting)
        : scorePitching(statLine, input.tables.pitching),
      mlbTeam: row.team,
      matchedName,
    });
    matchedCount += 1;
  }

  players.sort((a, b) => b.fantasyPoints - a.fantasyPoints);

  return { players, unmatched, matchedCount };
}

export function describeUnmatched(unmatched: readonly string[], limit = 20): string | null {
  if (unmatched.length === 0) {
    return null;
  }

  if (unmatched.length <= limit) {
    return `Unmatched: ${unmatched.join(", ")}`;
  }

  return `${unmatched.length} unmatched players`;
}

function buildPool(rows: readonly StatRow[]): StatPool {
  const rowsByName = new Map<string, StatRow>();
  for (const row of rows) {
    if (!rowsByName.has(row.name)) {
      rowsByName.set(row.name, row);
    }
  }

  return {
    index: new PlayerNameIndex(rows.map((row) => row.name)),
    rowsByName,
  };
}

function unmatchedRecord(entry: RosterEntry): PlayerSeasonRecord {
  return {
    ...entry,
    stats: {},
    fantasyPoints: 0,
    mlbTeam: "",
    matchedName: null,
  };
}

function toNumericStats(stats: StatRecord): Record<string, number> {
  const numeric: Record<string, number> = {};
  for (const [stat, value] of Object.entries(stats)) {
    numeric[stat] = toStatNumber(value);
  }

  return numeric;
}
