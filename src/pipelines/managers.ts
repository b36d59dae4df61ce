import { forSeason, type LeagueConfig, type ManagerIdentityRule } from "../config";
import type {
  ManagerCareerRecord,
  ManagerHistoryRow,
  SeasonStandings,
  StandingRecord,
} from "../types";
import { roundTo } from "../utils/number";
import { titleCase } from "../utils/text";

type ManagerNameConfig = Pick<LeagueConfig, "managerNameMap" | "managerTeamOverrides">;
type ManagerStatsConfig = Pick<LeagueConfig, "managerIdentityRules" | "rankCorrections" | "playoffTeams">;

/**
 * Provider nicknames come in whatever case the manager typed. Title-cases the
 * name, then applies the per-season team overrides and the name map.
 */
export function normalizeManagerName(
  rawName: string,
  year: number | null,
  teamName: string | null,
  config: ManagerNameConfig
): string {
  const normalized = titleCase(rawName);

  if (year !== null && teamName) {
    const teamOverrides = forSeason(config.managerTeamOverrides, year);
    const byTeam = teamOverrides ? lookup(teamOverrides, teamName) : null;
    if (byTeam) {
      return byTeam;
    }
  }

  return lookup(config.managerNameMap, normalized) ?? normalized;
}

/** First rule whose conditions all hold decides the identity; otherwise the name stands. */
export function resolveManagerIdentity(
  team: Pick<StandingRecord, "manager" | "teamKey" | "teamName">,
  year: number,
  rules: readonly ManagerIdentityRule[]
): string {
  const rule = rules.find((candidate) => ruleApplies(candidate, team, year));
  return rule ? rule.resolvedName : team.manager;
}

export function applyRankCorrections(
  standings: readonly StandingRecord[],
  corrections: Record<string, number> | null
): StandingRecord[] {
  if (!corrections) {
    return [...standings];
  }

  return standings
    .map((team) => {
      const rank = lookup(corrections, team.manager);
      return rank === null ? { ...team } : { ...team, rank };
    })
    .sort((a, b) => a.rank - b.rank);
}

export function calculateManagerStats(
  seasons: readonly SeasonStandings[],
  config: ManagerStatsConfig
): ManagerCareerRecord[] {
  const byManager = new Map<string, ManagerCareerRecord>();

  for (const season of seasons) {
    const standings = applyRankCorrections(season.standings, forSeason(config.rankCorrections, season.year));

    for (const team of standings) {
      const manager = resolveManagerIdentity(team, season.year, config.managerIdentityRules);

      let record = byManager.get(manager);
      if (!record) {
        record = emptyCareer(manager, season.year);
        byManager.set(manager, record);
      }

      record.totalWins += team.wins;
      record.totalLosses += team.losses;
      record.totalTies += team.ties;
      record.totalPointsFor += team.pointsFor;
      record.seasonsPlayed += 1;
      record.firstSeason = Math.min(record.firstSeason, season.year);

      if (team.rank === 1) {
        record.championships += 1;
      }
      if (team.rank === 2) {
        record.runnerUps += 1;
      }
      if (team.rank <= config.playoffTeams) {
        record.playoffAppearances += 1;
      }

      record.seasonHistory.push({
        year: season.year,
        teamName: team.teamName,
        rank: team.rank,
        wins: team.wins,
        losses: team.losses,
        pointsFor: team.pointsFor,
      });
    }
  }

  return Array.from(byManager.values()).map((record) => {
    const decisions = record.totalWins + record.totalLosses;
    const rankSum = record.seasonHistory.reduce((sum, entry) => sum + entry.rank, 0);

    return {
      ...record,
      totalPointsFor: roundTo(record.totalPointsFor, 2),
      winPct: decisions > 0 ? roundTo(record.totalWins / decisions, 3) : 0,
      avgFinish: record.seasonHistory.length > 0 ? roundTo(rankSum / record.seasonHistory.length, 1) : 0,
    };
  });
}

export function flattenManagerHistory(careers: readonly ManagerCareerRecord[]): ManagerHistoryRow[] {
  return careers.flatMap((career) =>
    career.seasonHistory.map((season) => ({ manager: career.managerName, ...season }))
  );
}

function ruleApplies(
  rule: ManagerIdentityRule,
  team: Pick<StandingRecord, "manager" | "teamKey" | "teamName">,
  year: number
): boolean {
  if (rule.manager !== team.manager) {
    return false;
  }
  if (rule.fromYear !== undefined && year < rule.fromYear) {
    return false;
  }
  if (rule.toYear !== undefined && year > rule.toYear) {
    return false;
  }
  if (rule.teamKey !== undefined && rule.teamKey !== team.teamKey) {
    return false;
  }
  if (rule.teamKeySuffix !== undefined && !team.teamKey.endsWith(rule.teamKeySuffix)) {
    return false;
  }
  if (rule.teamNameIncludes !== undefined && !rule.teamNameIncludes.some((part) => team.teamName.includes(part))) {
    return false;
  }

  return true;
}

function emptyCareer(managerName: string, firstSeason: number): ManagerCareerRecord {
  return {
    managerName,
    firstSeason,
    totalWins: 0,
    totalLosses: 0,
    totalTies: 0,
    championships: 0,
    runnerUps: 0,
    playoffAppearances: 0,
    seasonsPlayed: 0,
    totalPointsFor: 0,
    winPct: 0,
    avgFinish: 0,
    seasonHistory: [],
  };
}

function lookup<T>(map: Record<string, T>, key: string): T | null {
  return Object.prototype.hasOwnProperty.call(map, key) ? map[key] : null;
}
