import { allSeasons, type LeagueConfig } from "../config";
import { buildScoringTables, defaultScoringTables } from "../scoring/tables";
import type { SeasonArtifact, SeasonScope, SeasonStore } from "../store/season-store";
import type {
  LeagueDataSource,
  LeagueInfo,
  LeagueSummary,
  PlayerSeasonRecord,
  PlayerSeasonResult,
  RosterEntry,
  ScoringSettingsArtifact,
  SeasonStandings,
  StandingRecord,
  StatRow,
  StatsDataSource,
  TeamInfo,
  TransactionRecord,
  TransactionType,
  WeekScore,
} from "../types";
import { settleWithConcurrency } from "../utils/async";
import { normalizeManagerName, calculateManagerStats, flattenManagerHistory } from "./managers";
import { buildPlayerCareers, type PlayerSeasonFile } from "./player-careers";
import { buildPlayerSeasonStats, describeUnmatched } from "./player-stats";

const TRANSACTION_TYPES: TransactionType[] = ["add", "drop", "add/drop", "trade"];
const ROSTER_CONCURRENCY = 4;

export interface CollectorLog {
  info(line: string): void;
  warn(line: string): void;
}

export interface LeagueCollectorOptions {
  league: LeagueDataSource;
  stats: StatsDataSource | null;
  store: SeasonStore;
  config: LeagueConfig;
  log?: CollectorLog;
  now?: () => Date;
  maxTransactionsPerType?: number;
}

export const consoleLog: CollectorLog = {
  info(line) {
    // eslint-disable-next-line no-console
    console.log(line);
  },
  warn(line) {
    // eslint-disable-next-line no-console
    console.warn(line);
  },
};

/**
 * Runs collection against the two providers and regenerates the season
 * artifacts. Each step is best-effort: a failure is logged and the run moves
 * on with whatever the remaining steps can produce.
 */
export class LeagueCollector {
  private readonly league: LeagueDataSource;
  private readonly stats: StatsDataSource | null;
  private readonly store: SeasonStore;
  private readonly config: LeagueConfig;
  private readonly log: CollectorLog;
  private readonly now: () => Date;
  private readonly maxTransactionsPerType: number;
  private readonly leagueKeys = new Map<number, string | null>();

  constructor(options: LeagueCollectorOptions) {
    this.league = options.league;
    this.stats = options.stats;
    this.store = options.store;
    this.config = options.config;
    this.log = options.log ?? consoleLog;
    this.now = options.now ?? (() => new Date());
    this.maxTransactionsPerType = options.maxTransactionsPerType ?? 1000;
  }

  async weeklyUpdate(): Promise<void> {
    this.banner(`WEEKLY UPDATE - ${this.now().toISOString()}`);
    await this.prepareStore();
    await this.collectSeasonResults(this.config.currentSeason);
    await this.updateManagerStats();
    await this.writeLeagueInfo();
    this.banner("✓ Weekly update complete!");
  }

  async initialSetup(): Promise<void> {
    this.banner("INITIAL SETUP - Collecting All Historical Data");
    await this.prepareStore();

    for (const year of this.config.historicalSeasons) {
      await this.collectSeasonResults(year);
    }

    await this.collectSeasonResults(this.config.currentSeason);
    await this.updateManagerStats();
    await this.writeLeagueInfo();
    this.banner("✓ Initial setup complete!");
  }

  async playerDataSetup(): Promise<void> {
    this.banner("PLAYER DATA SETUP - Collecting Player Stats & Transactions");
    await this.prepareStore();

    for (const year of this.config.historicalSeasons) {
      await this.collectSeasonPlayerData(year);
    }

    await this.collectSeasonPlayerData(this.config.currentSeason);
    await this.buildPlayerCareerHistory();
    this.banner("✓ Player data setup complete!");
  }

  async fullUpdate(): Promise<void> {
    this.banner(`FULL WEEKLY UPDATE - ${this.now().toISOString()}`);
    await this.prepareStore();
    await this.collectSeasonResults(this.config.currentSeason);

    if (this.stats) {
      await this.collectSeasonPlayerData(this.config.currentSeason);
      await this.buildPlayerCareerHistory();
    } else {
      this.log.warn("⚠ Stats provider not configured, skipping player stats");
    }

    await this.updateManagerStats();
    await this.writeLeagueInfo();
    this.banner("✓ Full weekly update complete!");
  }

  async checkAvailableSeasons(fromYear: number, toYear: number): Promise<Map<number, LeagueSummary[]>> {
    this.banner("CHECKING AVAILABLE SEASONS");
    const found = new Map<number, LeagueSummary[]>();

    for (let year = fromYear; year <= toYear; year += 1) {
      const leagues = await this.step(`${year} leagues`, () => this.league.findLeagues(year), []);
      if (leagues.length === 0) {
        continue;
      }

      found.set(year, leagues);
      this.log.info(`${year}:`);
      for (const league of leagues) {
        this.log.info(league.name ? `  - '${league.name}' (ID: ${league.leagueKey})` : `  - ID: ${league.leagueKey}`);
      }
    }

    return found;
  }

  async testStatsProvider(year: number): Promise<{ batters: number; pitchers: number }> {
    this.banner(`TESTING STATS PROVIDER FOR ${year}`);
    const [batting, pitching] = await Promise.all([this.fetchBatting(year), this.fetchPitching(year)]);

    for (const row of batting.slice(0, 3)) {
      this.log.info(`  ${row.name} (${row.team}) HR ${row.stats.HR ?? 0} RBI ${row.stats.RBI ?? 0}`);
    }
    for (const row of pitching.slice(0, 3)) {
      this.log.info(`  ${row.name} (${row.team}) W ${row.stats.W ?? 0} SO ${row.stats.SO ?? 0}`);
    }

    return { batters: batting.length, pitchers: pitching.length };
  }

  async testSeasonPlayers(year: number): Promise<PlayerSeasonRecord[]> {
    this.banner(`TESTING PLAYER DATA COLLECTION FOR ${year}`);
    await this.prepareStore();

    const { players } = await this.buildSeasonPlayers(year);
    if (players.length === 0) {
      this.log.warn("✗ Failed to collect player data");
      return players;
    }

    const file = await this.saveData(`test_player_stats_${year}.json`, players);
    this.log.info(`✓ Collected ${players.length} players`);
    if (file) {
      this.log.info(`✓ Saved to ${file}`);
    }
    this.log.info("Top 5 players by fantasy points:");
    players.slice(0, 5).forEach((player, index) => {
      this.log.info(`  ${index + 1}. ${player.name} (${player.manager}) - ${player.fantasyPoints} pts`);
    });

    return players;
  }

  async collectSeasonResults(year: number): Promise<void> {
    const scope = this.scopeFor(year);
    this.log.info(`# Collecting ${year} season results...`);

    const leagueKey = await this.resolveLeagueKey(year);
    if (!leagueKey) {
      this.log.warn(`⚠ No league found for ${year}`);
      return;
    }

    const standings = await this.step(`${year} standings`, () => this.fetchStandings(leagueKey, year), []);
    const teams = await this.step(`${year} teams`, () => this.fetchTeams(leagueKey, year, standings), []);
    const weeks = scope === "current" ? this.config.currentSeasonWeeks : this.config.historicalWeeks;
    const scores = await this.collectSeasonScores(leagueKey, weeks);

    if (scope === "current") {
      await this.saveSeason(scope, "standings", standings);
      await this.saveSeason(scope, "teams", teams);
      await this.saveSeason(scope, "all_scores", scores);

      const byWeek = groupScoresByWeek(scores);
      for (const [week, weekScores] of byWeek) {
        await this.saveSeason(scope, `week_${week}_scores`, weekScores);
      }

      this.log.info(`✓ Current season updated (${byWeek.size} weeks)`);
      return;
    }

    const draft = await this.step(`${year} draft`, () => this.league.getDraftResults(leagueKey), []);
    await this.saveSeason(scope, "final_standings", standings);
    await this.saveSeason(scope, "all_scores", scores);
    await this.saveSeason(scope, "draft", draft);
    await this.saveSeason(scope, "teams", teams);
    this.log.info(`✓ ${year} season saved`);
  }

  /** Weeks 1..n, stopping at the first week that fails or has no matchups yet. */
  async collectSeasonScores(leagueKey: string, weeks: number): Promise<WeekScore[]> {
    const scores: WeekScore[] = [];

    for (let week = 1; week <= weeks; week += 1) {
      try {
        const weekScores = await this.league.getScoreboard(leagueKey, week);
        if (weekScores.length === 0) {
          this.log.info(`  ✗ Week ${week} has no matchups`);
          break;
        }

        scores.push(...weekScores);
        this.log.info(`  ✓ Week ${week} collected`);
      } catch (error) {
        this.log.warn(`  ✗ Week ${week} not available: ${errorMessage(error)}`);
        break;
      }
    }

    return scores;
  }

  async collectSeasonPlayerData(year: number): Promise<void> {
    const scope = this.scopeFor(year);
    this.banner(`Collecting ${year} player data...`);

    await this.step(`${year} player stats`, async () => {
      const { players } = await this.buildSeasonPlayers(year);
      await this.store.writeSeason(scope, "player_stats", players);
      this.log.info(`  ✓ Player stats saved (${players.length} players)`);
    }, undefined);

    await this.step(`${year} transactions`, async () => {
      const leagueKey = await this.resolveLeagueKey(year);
      const transactions = leagueKey ? await this.collectTransactions(leagueKey) : [];
      await this.store.writeSeason(scope, "transactions", transactions);
      this.log.info(`  ✓ Transactions saved (${transactions.length} transactions)`);
    }, undefined);

    await this.step(`${year} scoring settings`, async () => {
      const leagueKey = await this.resolveLeagueKey(year);
      const scoring = leagueKey ? await this.collectScoringSettings(leagueKey) : defaultScoringArtifact();
      await this.store.writeSeason(scope, "scoring_settings", scoring);
      this.log.info("  ✓ Scoring settings saved");
    }, undefined);
  }

  async buildSeasonPlayers(year: number): Promise<PlayerSeasonResult> {
    this.log.info(`# Building player stats for ${year}...`);
    const empty: PlayerSeasonResult = { players: [], unmatched: [], matchedCount: 0 };

    const leagueKey = await this.resolveLeagueKey(year);
    if (!leagueKey) {
      this.log.warn(`⚠ No league found for ${year}`);
      return empty;
    }

    this.log.info("  Step 1: Fetching rosters...");
    const roster = await this.collectRosters(leagueKey, year);
    this.log.info(`    ✓ Got ${roster.length} rostered players`);

    this.log.info("  Step 2: Fetching scoring settings...");
    const scoring = await this.collectScoringSettings(leagueKey);

    this.log.info("  Step 3: Fetching season stats...");
    const [batting, pitching] = await Promise.all([this.fetchBatting(year), this.fetchPitching(year)]);
    if (batting.length === 0 && pitching.length === 0) {
      this.log.warn("  ⚠ No stats available, returning roster-only data");
    }

    this.log.info("  Step 4: Matching players and calculating fantasy points...");
    const result = buildPlayerSeasonStats({
      roster,
      batting,
      pitching,
      tables: { batting: scoring.batting, pitching: scoring.pitching },
    });

    this.log.info(`    ✓ Matched ${result.matchedCount}/${roster.length} players`);
    const unmatched = describeUnmatched(result.unmatched);
    if (unmatched) {
      this.log.info(`    ${unmatched}`);
    }

    return result;
  }

  async collectRosters(leagueKey: string, year: number): Promise<RosterEntry[]> {
    const teams = await this.step(`${year} teams`, () => this.fetchTeams(leagueKey, year, []), []);

    const results = await settleWithConcurrency(teams, ROSTER_CONCURRENCY, (team) => this.league.getRoster(team));
    const rosters = results.map((result, index) => {
      if (result.status === "fulfilled") {
        return result.value;
      }

      this.log.warn(`    ⚠ Could not get roster for ${teams[index].teamName}: ${errorMessage(result.reason)}`);
      return [];
    });

    return rosters.flat();
  }

  async collectScoringSettings(leagueKey: string): Promise<ScoringSettingsArtifact> {
    try {
      const rawSettings = await this.league.getScoringSettings(leagueKey);
      return { ...buildScoringTables(rawSettings), rawSettings };
    } catch (error) {
      this.log.warn(`  ⚠ Could not get scoring settings, using defaults: ${errorMessage(error)}`);
      return defaultScoringArtifact();
    }
  }

  /** Every transaction type, de-duplicated by key, newest first. */
  async collectTransactions(leagueKey: string): Promise<TransactionRecord[]> {
    const byKey = new Map<string, TransactionRecord>();

    for (const type of TRANSACTION_TYPES) {
      try {
        const transactions = await this.league.getTransactions(leagueKey, type, this.maxTransactionsPerType);
        for (const transaction of transactions) {
          const key = transaction.transactionKey || `${type}:${transaction.transactionId}:${transaction.timestamp}`;
          if (!byKey.has(key)) {
            byKey.set(key, transaction);
          }
        }
        this.log.info(`      ✓ ${transactions.length} ${type} transactions`);
      } catch (error) {
        this.log.warn(`    ⚠ Could not get ${type} transactions: ${errorMessage(error)}`);
      }
    }

    const all = Array.from(byKey.values())
      .map((record) => ({ record, epoch: parseEpoch(record.timestamp) }))
      .sort(compareEpochsDescending)
      .map(({ record }) => record);
    this.log.info(`    Total: ${all.length} transactions`);
    return all;
  }

  async updateManagerStats(): Promise<void> {
    this.log.info("# Updating manager statistics...");
    const seasons: SeasonStandings[] = [];

    for (const year of allSeasons(this.config)) {
      const scope = this.scopeFor(year);
      const standings = await this.step(
        `${year} standings`,
        () => this.store.readSeason<StandingRecord[]>(scope, scope === "current" ? "standings" : "final_standings"),
        null
      );
      if (standings && standings.length > 0) {
        seasons.push({ year, standings });
        this.log.info(`  ✓ Loaded ${year} season`);
      }
    }

    if (seasons.length === 0) {
      this.log.warn("  ⚠ No season data available");
      return;
    }

    const careers = calculateManagerStats(seasons, this.config);
    await this.saveData("managers/all_time_stats.json", careers);
    await this.saveData("managers/manager_history.json", flattenManagerHistory(careers));
    this.log.info(`✓ Manager stats updated (${careers.length} managers)`);
  }

  async buildPlayerCareerHistory(): Promise<void> {
    this.log.info("# Building player career history...");
    const seasons: PlayerSeasonFile[] = [];

    for (const year of allSeasons(this.config)) {
      const players = await this.step(
        `${year} player stats`,
        () => this.store.readSeason<PlayerSeasonRecord[]>(this.scopeFor(year), "player_stats"),
        null
      );
      if (players) {
        seasons.push({ year, players });
      }
    }

    const careers = buildPlayerCareers(seasons);
    await this.saveData("players/player_history.json", careers);
    this.log.info(`✓ Player career history built (${Object.keys(careers).length} players)`);
  }

  async writeLeagueInfo(): Promise<LeagueInfo> {
    const info: LeagueInfo = {
      leagueName: this.config.leagueName,
      founded:
        this.config.historicalSeasons.length > 0
          ? Math.min(...this.config.historicalSeasons)
          : this.config.currentSeason,
      currentSeason: this.config.currentSeason,
      totalTeams: this.config.totalTeams,
      leagueType: this.config.leagueType,
      lastUpdated: this.now().toISOString(),
    };

    await this.saveData("league_info.json", info);
    return info;
  }

  private async resolveLeagueKey(year: number): Promise<string | null> {
    if (this.leagueKeys.has(year)) {
      return this.leagueKeys.get(year) ?? null;
    }

    const leagues = await this.step(`${year} league lookup`, () => this.league.findLeagues(year), []);
    const leagueKey = leagues[0]?.leagueKey ?? null;
    this.leagueKeys.set(year, leagueKey);
    return leagueKey;
  }

  private async fetchStandings(leagueKey: string, year: number): Promise<StandingRecord[]> {
    const standings = await this.league.getStandings(leagueKey);
    return standings.map((standing) => ({
      ...standing,
      manager: normalizeManagerName(standing.manager, year, standing.teamName, this.config),
    }));
  }

  private async fetchTeams(leagueKey: string, year: number, standings: readonly StandingRecord[]): Promise<TeamInfo[]> {
    const teams = (await this.league.getTeams(leagueKey)).map((team) => ({
      ...team,
      manager: normalizeManagerName(team.manager, year, team.teamName, this.config),
    }));

    if (standings.length === 0) {
      return teams;
    }

    const order = new Map(standings.map((standing, index) => [standing.teamKey, index]));
    return teams.sort(
      (a, b) => (order.get(a.teamKey) ?? Number.MAX_SAFE_INTEGER) - (order.get(b.teamKey) ?? Number.MAX_SAFE_INTEGER)
    );
  }

  private async fetchBatting(year: number): Promise<StatRow[]> {
    const stats = this.stats;
    if (!stats) {
      return [];
    }

    const rows = await this.step(`${year} batting stats`, () => stats.getBattingStats(year), []);
    this.log.info(`    ✓ Got ${rows.length} batters`);
    return rows;
  }

  private async fetchPitching(year: number): Promise<StatRow[]> {
    const stats = this.stats;
    if (!stats) {
      return [];
    }

    const rows = await this.step(`${year} pitching stats`, () => stats.getPitchingStats(year), []);
    this.log.info(`    ✓ Got ${rows.length} pitchers`);
    return rows;
  }

  private async prepareStore(): Promise<void> {
    await this.step("data directory", () => this.store.ensureLayout(), undefined);
  }

  private async saveSeason(
    scope: SeasonScope,
    artifact: SeasonArtifact | `week_${number}_scores`,
    payload: unknown
  ): Promise<string | null> {
    const season = scope === "current" ? "current season" : String(scope);
    return this.step<string | null>(`save ${season} ${artifact}`, () => this.store.writeSeason(scope, artifact, payload), null);
  }

  private async saveData(relativePath: string, payload: unknown): Promise<string | null> {
    return this.step<string | null>(`save ${relativePath}`, () => this.store.writeData(relativePath, payload), null);
  }

  private scopeFor(year: number): SeasonScope {
    return year === this.config.currentSeason ? "current" : year;
  }

  private async step<T>(label: string, run: () => Promise<T>, fallback: T): Promise<T> {
    try {
      return await run();
    } catch (error) {
      this.log.warn(`  ⚠ ${label}: ${errorMessage(error)}`);
      return fallback;
    }
  }

  private banner(title: string): void {
    this.log.info("=".repeat(60));
    this.log.info(title);
    this.log.info("=".repeat(60));
  }
}

export function groupScoresByWeek(scores: readonly WeekScore[]): Map<number, WeekScore[]> {
  const byWeek = new Map<number, WeekScore[]>();
  for (const score of scores) {
    const bucket = byWeek.get(score.week) ?? [];
    bucket.push(score);
    byWeek.set(score.week, bucket);
  }

  return byWeek;
}

function defaultScoringArtifact(): ScoringSettingsArtifact {
  return { ...defaultScoringTables(), rawSettings: [] };
}

/** Epoch seconds, or null for an empty or non-numeric timestamp. */
function parseEpoch(timestamp: string): number | null {
  const trimmed = timestamp.trim();
  return /^\d+$/.test(trimmed) ? Number.parseInt(trimmed, 10) : null;
}

// Newest first; records without a usable timestamp go last in arrival order.
function compareEpochsDescending(a: { epoch: number | null }, b: { epoch: number | null }): number {
  if (a.epoch === null || b.epoch === null) {
    if (a.epoch === b.epoch) {
      return 0;
    }
    return a.epoch === null ? 1 : -1;
  }

  return b.epoch - a.epoch;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
