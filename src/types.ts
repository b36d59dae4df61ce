export type PlayerRole = "batter" | "pitcher";

export type StatValue = number | string | null | undefined;

/** Raw per-player stat line keyed by stat abbreviation. Values are coerced at scoring time. */
export type StatRecord = Record<string, StatValue>;

export type ScoringTable = Record<string, number>;

export interface ScoringTables {
  batting: ScoringTable;
  pitching: ScoringTable;
}

export type StatPositionType = "B" | "P";

export interface LeagueStatSetting {
  statLabel: string;
  pointValue: number | string | null;
  statId?: string | null;
  positionType?: StatPositionType | null;
}

export interface RosterEntry {
  playerId: string;
  playerKey: string | null;
  name: string;
  /** Null when the provider lists the player with neither a batting nor a pitching type. */
  role: PlayerRole | null;
  eligiblePositions: string[];
  primaryPosition: string;
  selectedPosition: string;
  status: string;
  teamKey: string;
  teamName: string;
  teamLogo: string;
  manager: string;
}

export interface StatRow {
  name: string;
  team: string;
  stats: StatRecord;
}

export interface PlayerSeasonRecord extends RosterEntry {
  stats: Record<string, number>;
  fantasyPoints: number;
  mlbTeam: string;
  matchedName: string | null;
}

export interface PlayerSeasonResult {
  players: PlayerSeasonRecord[];
  unmatched: string[];
  matchedCount: number;
}

export interface TeamInfo {
  teamKey: string;
  teamName: string;
  teamLogo: string;
  manager: string;
}

export interface StandingRecord {
  rank: number;
  teamKey: string;
  teamName: string;
  manager: string;
  wins: number;
  losses: number;
  ties: number;
  winPct: number;
  pointsFor: number;
  pointsAgainst: number;
}

export interface WeekScore {
  teamKey: string;
  teamScore: number;
  week: number;
  opponentKey: string;
  opponentScore: number;
}

export interface DraftPick {
  pick: number;
  round: number;
  teamKey: string;
  playerKey: string;
}

export type TransactionType = "add" | "drop" | "add/drop" | "trade";

export interface TransactionPlayer {
  playerKey: string;
  playerName: string;
  transactionType: string;
  sourceType: string;
  sourceTeamKey: string;
  sourceTeamName: string;
  destinationTeamKey: string;
  destinationTeamName: string;
}

export interface TransactionRecord {
  transactionKey: string;
  transactionId: string;
  type: string;
  timestamp: string;
  status: string;
  players: TransactionPlayer[];
}

export interface LeagueSummary {
  leagueKey: string;
  name: string;
  season: number | null;
}

export interface ScoringSettingsArtifact extends ScoringTables {
  rawSettings: LeagueStatSetting[];
}

export interface SeasonStandings {
  year: number;
  standings: StandingRecord[];
}

export interface ManagerSeasonRecord {
  year: number;
  teamName: string;
  rank: number;
  wins: number;
  losses: number;
  pointsFor: number;
}

export interface ManagerCareerRecord {
  managerName: string;
  firstSeason: number;
  totalWins: number;
  totalLosses: number;
  totalTies: number;
  championships: number;
  runnerUps: number;
  playoffAppearances: number;
  seasonsPlayed: number;
  totalPointsFor: number;
  winPct: number;
  avgFinish: number;
  seasonHistory: ManagerSeasonRecord[];
}

export interface ManagerHistoryRow extends ManagerSeasonRecord {
  manager: string;
}

export interface PlayerCareerSeason {
  year: number;
  teamName: string;
  manager: string;
  fantasyPoints: number;
  role: PlayerRole | null;
  stats: Record<string, number>;
}

export interface PlayerCareerRecord {
  name: string;
  seasons: PlayerCareerSeason[];
  careerFantasyPoints: number;
}

export interface LeagueInfo {
  leagueName: string;
  founded: number;
  currentSeason: number;
  totalTeams: number;
  leagueType: string;
  lastUpdated: string;
}

/** League provider: rosters, standings, matchups, transactions and scoring settings. */
export interface LeagueDataSource {
  findLeagues(season: number): Promise<LeagueSummary[]>;
  getTeams(leagueKey: string): Promise<TeamInfo[]>;
  getStandings(leagueKey: string): Promise<StandingRecord[]>;
  getScoreboard(leagueKey: string, week: number): Promise<WeekScore[]>;
  getDraftResults(leagueKey: string): Promise<DraftPick[]>;
  getScoringSettings(leagueKey: string): Promise<LeagueStatSetting[]>;
  getRoster(team: TeamInfo): Promise<RosterEntry[]>;
  getTransactions(leagueKey: string, type: TransactionType, count: number): Promise<TransactionRecord[]>;
}

/** Stats provider: one season leaderboard per role. */
export interface StatsDataSource {
  getBattingStats(season: number): Promise<StatRow[]>;
  getPitchingStats(season: number): Promise<StatRow[]>;
}
