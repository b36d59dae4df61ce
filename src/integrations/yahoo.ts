import axios, { AxiosError } from "axios";
import { load, type Cheerio, type CheerioAPI } from "cheerio";
import type { Element } from "domhandler";
import { TtlCache } from "../utils/cache";
import { cleanText, parseInteger, parseNumber } from "../utils/text";
import type {
  DraftPick,
  LeagueDataSource,
  LeagueStatSetting,
  LeagueSummary,
  PlayerRole,
  RosterEntry,
  StandingRecord,
  StatPositionType,
  TeamInfo,
  TransactionPlayer,
  TransactionRecord,
  TransactionType,
  WeekScore,
} from "../types";

const DEFAULT_API_BASE_URL = "https://fantasysports.yahooapis.com/fantasy/v2";
const TOKEN_ENDPOINT = "https://api.login.yahoo.com/oauth2/get_token";
const USER_AGENT = "fantasy-league-ledger/1.0";
const TOKEN_EXPIRY_MARGIN_MS = 60_000;

export type YahooAuth =
  | { kind: "token"; accessToken: string }
  | { kind: "refresh"; clientId: string; clientSecret: string; refreshToken: string };

interface TokenResponse {
  access_token?: string;
  expires_in?: number;
}

export class YahooFantasyClient implements LeagueDataSource {
  private readonly apiBaseUrl: string;
  private readonly tokenCache = new TtlCache<string, string>();

  constructor(
    private readonly auth: YahooAuth,
    private readonly leagueKeyOverrides: Record<string, string> = {},
    apiBaseUrl: string = DEFAULT_API_BASE_URL
  ) {
    this.apiBaseUrl = apiBaseUrl.replace(/\/+$/g, "");
  }

  static fromEnv(
    env: NodeJS.ProcessEnv = process.env,
    leagueKeyOverrides: Record<string, string> = {}
  ): YahooFantasyClient {
    const apiBaseUrl = firstNonEmpty(env.YAHOO_API_BASE_URL) ?? DEFAULT_API_BASE_URL;
    const accessToken = firstNonEmpty(env.YAHOO_ACCESS_TOKEN);
    if (accessToken) {
      return new YahooFantasyClient({ kind: "token", accessToken }, leagueKeyOverrides, apiBaseUrl);
    }

    const clientId = firstNonEmpty(env.YAHOO_CLIENT_ID);
    const clientSecret = firstNonEmpty(env.YAHOO_CLIENT_SECRET);
    const refreshToken = firstNonEmpty(env.YAHOO_REFRESH_TOKEN);

    if (!clientId || !clientSecret || !refreshToken) {
      const missing = [
        clientId ? null : "YAHOO_CLIENT_ID",
        clientSecret ? null : "YAHOO_CLIENT_SECRET",
        refreshToken ? null : "YAHOO_REFRESH_TOKEN",
      ].filter((name): name is string => name !== null);
      throw new Error(`Missing Yahoo credentials: set YAHOO_ACCESS_TOKEN or ${missing.join(", ")}`);
    }

    return new YahooFantasyClient(
      { kind: "refresh", clientId, clientSecret, refreshToken },
      leagueKeyOverrides,
      apiBaseUrl
    );
  }

  async findLeagues(season: number): Promise<LeagueSummary[]> {
    const override = this.leagueKeyOverrides[String(season)];
    if (override) {
      return [{ leagueKey: override, name: "", season }];
    }

    const xml = await this.request(`users;use_login=1/games;game_codes=mlb;seasons=${season}/leagues`);
    return parseLeaguesXml(xml);
  }

  async getTeams(leagueKey: string): Promise<TeamInfo[]> {
    return parseTeamsXml(await this.request(`league/${leagueKey}/teams`));
  }

  async getStandings(leagueKey: string): Promise<StandingRecord[]> {
    return parseStandingsXml(await this.request(`league/${leagueKey}/standings`));
  }

  async getScoreboard(leagueKey: string, week: number): Promise<WeekScore[]> {
    return parseScoreboardXml(await this.request(`league/${leagueKey}/scoreboard;week=${week}`), week);
  }

  async getDraftResults(leagueKey: string): Promise<DraftPick[]> {
    return parseDraftResultsXml(await this.request(`league/${leagueKey}/draftresults`));
  }

  async getScoringSettings(leagueKey: string): Promise<LeagueStatSetting[]> {
    return parseScoringSettingsXml(await this.request(`league/${leagueKey}/settings`));
  }

  async getRoster(team: TeamInfo): Promise<RosterEntry[]> {
    return parseRosterXml(await this.request(`team/${team.teamKey}/roster/players`), team);
  }

  async getTransactions(leagueKey: string, type: TransactionType, count: number): Promise<TransactionRecord[]> {
    const xml = await this.request(`league/${leagueKey}/transactions;types=${type};count=${count}`);
    return parseTransactionsXml(xml, type);
  }

  private async request(resourcePath: string): Promise<string> {
    const token = await this.accessToken();

    try {
      const response = await axios.get<string>(`${this.apiBaseUrl}/${resourcePath}`, {
        timeout: 30_000,
        responseType: "text",
        transformResponse: [(value) => value],
        headers: {
          Authorization: `Bearer ${token}`,
          Accept: "application/xml",
          "User-Agent": USER_AGENT,
        },
      });

      const body = String(response.data ?? "");
      if (!body) {
        throw new Error(`Yahoo returned an empty response for ${resourcePath}.`);
      }

      return body;
    } catch (error) {
      throw new Error(formatYahooError(error));
    }
  }

  private async accessToken(): Promise<string> {
    if (this.auth.kind === "token") {
      return this.auth.accessToken;
    }

    const { clientId, clientSecret, refreshToken } = this.auth;
    const cached = this.tokenCache.get(refreshToken);
    if (cached) {
      return cached;
    }

    const basic = Buffer.from(`${clientId}:${clientSecret}`, "utf8").toString("base64");
    const form = new URLSearchParams({
      grant_type: "refresh_token",
      redirect_uri: "oob",
      refresh_token: refreshToken,
    });

    try {
      const response = await axios.post<TokenResponse>(TOKEN_ENDPOINT, form.toString(), {
        timeout: 20_000,
        headers: {
          Authorization: `Basic ${basic}`,
          "Content-Type": "application/x-www-form-urlencoded",
          "User-Agent": USER_AGENT,
        },
      });

      const token = String(response.data?.access_token ?? "").trim();
      if (!token) {
        throw new Error("Yahoo token response did not include an access token.");
      }

      const expiresInMs = (response.data?.expires_in ?? 3600) * 1000;
      this.tokenCache.set(refreshToken, token, Math.max(expiresInMs - TOKEN_EXPIRY_MARGIN_MS, 0));
      return token;
    } catch (error) {
      throw new Error(formatYahooError(error));
    }
  }
}

export function parseLeaguesXml(xml: string): LeagueSummary[] {
  const $ = load(xml, { xmlMode: true });

  return $("league")
    .toArray()
    .map((node) => {
      const league = $(node);
      return {
        leagueKey: childText(league, "league_key"),
        name: childText(league, "name"),
        season: parseInteger(childText(league, "season")),
      };
    })
    .filter((league) => league.leagueKey.length > 0);
}

export function parseTeamsXml(xml: string): TeamInfo[] {
  const $ = load(xml, { xmlMode: true });
  return $("teams > team")
    .toArray()
    .map((node) => parseTeamInfo($, node))
    .filter((team) => team.teamKey.length > 0);
}

export function parseStandingsXml(xml: string): StandingRecord[] {
  const $ = load(xml, { xmlMode: true });

  return $("standings teams > team")
    .toArray()
    .map((node) => {
      const team = $(node);
      const info = parseTeamInfo($, node);
      const standing = team.children("team_standings").first();
      const totals = standing.children("outcome_totals").first();

      return {
        rank: parseInteger(childText(standing, "rank")) ?? 0,
        teamKey: info.teamKey,
        teamName: info.teamName,
        manager: info.manager,
        wins: parseInteger(childText(totals, "wins")) ?? 0,
        losses: parseInteger(childText(totals, "losses")) ?? 0,
        ties: parseInteger(childText(totals, "ties")) ?? 0,
        winPct: parseNumber(childText(totals, "percentage")) ?? 0,
        pointsFor: parseNumber(childText(standing, "points_for")) ?? 0,
        pointsAgainst: parseNumber(childText(standing, "points_against")) ?? 0,
      };
    })
    .filter((standing) => standing.teamKey.length > 0);
}

/** Both sides of every matchup, each with its opponent. */
export function parseScoreboardXml(xml: string, requestedWeek: number): WeekScore[] {
  const $ = load(xml, { xmlMode: true });
  const scores: WeekScore[] = [];

  $("matchups > matchup").each((_, matchupNode) => {
    const matchup = $(matchupNode);
    const teams = matchup.find("teams > team").toArray().map((node) => $(node));
    if (teams.length < 2) {
      return;
    }

    const [first, second] = teams;
    const week = parseInteger(childText(matchup, "week")) ?? requestedWeek;
    const firstKey = childText(first, "team_key");
    const secondKey = childText(second, "team_key");
    const firstScore = parseNumber(first.children("team_points").children("total").first().text()) ?? 0;
    const secondScore = parseNumber(second.children("team_points").children("total").first().text()) ?? 0;

    if (!firstKey || !secondKey) {
      return;
    }

    scores.push(
      { teamKey: firstKey, teamScore: firstScore, week, opponentKey: secondKey, opponentScore: secondScore },
      { teamKey: secondKey, teamScore: secondScore, week, opponentKey: firstKey, opponentScore: firstScore }
    );
  });

  return scores;
}

export function parseDraftResultsXml(xml: string): DraftPick[] {
  const $ = load(xml, { xmlMode: true });

  return $("draft_results > draft_result")
    .toArray()
    .map((node) => {
      const pick = $(node);
      return {
        pick: parseInteger(childText(pick, "pick")) ?? 0,
        round: parseInteger(childText(pick, "round")) ?? 0,
        teamKey: childText(pick, "team_key"),
        playerKey: childText(pick, "player_key"),
      };
    })
    .filter((pick) => pick.pick > 0);
}

/**
 * Joins the category list (labels, position types) with the modifier list
 * (point values). Categories without a modifier are display-only and are
 * dropped.
 */
export function parseScoringSettingsXml(xml: string): LeagueStatSetting[] {
  const $ = load(xml, { xmlMode: true });

  const pointValues = new Map<string, string>();
  $("stat_modifiers stats > stat").each((_, node) => {
    const stat = $(node);
    const statId = childText(stat, "stat_id");
    const value = childText(stat, "value");
    if (statId && value) {
      pointValues.set(statId, value);
    }
  });

  return $("stat_categories stats > stat")
    .toArray()
    .map((node): { statId: string; statLabel: string; pointValue: number | null; positionType: StatPositionType | null } => {
      const stat = $(node);
      const statId = childText(stat, "stat_id");
      const positionType = childText(stat, "position_type");

      return {
        statId,
        statLabel: childText(stat, "display_name") || childText(stat, "name"),
        pointValue: parseNumber(pointValues.get(statId) ?? null),
        positionType: positionType === "B" || positionType === "P" ? positionType : null,
      };
    })
    .filter((setting) => setting.statId.length > 0 && setting.pointValue !== null);
}

export function parseRosterXml(xml: string, team: TeamInfo): RosterEntry[] {
  const $ = load(xml, { xmlMode: true });
  const entries: RosterEntry[] = [];

  $("players > player").each((_, node) => {
    const player = $(node);
    const role = toPlayerRole(childText(player, "position_type"));
    const name = cleanText(player.children("name").children("full").first().text());
    if (!name) {
      return;
    }

    const eligiblePositions = player
      .children("eligible_positions")
      .children("position")
      .toArray()
      .map((position) => cleanText($(position).text()))
      .filter((position) => position.length > 0);

    entries.push({
      playerId: childText(player, "player_id"),
      playerKey: childText(player, "player_key") || null,
      name,
      role,
      eligiblePositions,
      primaryPosition: eligiblePositions[0] ?? "",
      selectedPosition: cleanText(player.children("selected_position").children("position").first().text()),
      status: childText(player, "status"),
      teamKey: team.teamKey,
      teamName: team.teamName,
      teamLogo: team.teamLogo,
      manager: team.manager,
    });
  });

  return entries;
}

export function parseTransactionsXml(xml: string, fallbackType: string): TransactionRecord[] {
  const $ = load(xml, { xmlMode: true });

  return $("transactions > transaction")
    .toArray()
    .map((node) => {
      const transaction = $(node);
      const players = transaction
        .find("players > player")
        .toArray()
        .map((playerNode) => parseTransactionPlayer($, playerNode));

      return {
        transactionKey: childText(transaction, "transaction_key"),
        transactionId: childText(transaction, "transaction_id"),
        type: childText(transaction, "type") || fallbackType,
        timestamp: childText(transaction, "timestamp"),
        status: childText(transaction, "status"),
        players,
      };
    });
}

function parseTransactionPlayer($: CheerioAPI, node: Element): TransactionPlayer {
  const player = $(node);
  const data = player.children("transaction_data").first();

  return {
    playerKey: childText(player, "player_key"),
    playerName: cleanText(player.children("name").children("full").first().text()),
    transactionType: childText(data, "type"),
    sourceType: childText(data, "source_type"),
    sourceTeamKey: childText(data, "source_team_key"),
    sourceTeamName: childText(data, "source_team_name"),
    destinationTeamKey: childText(data, "destination_team_key"),
    destinationTeamName: childText(data, "destination_team_name"),
  };
}

function parseTeamInfo($: CheerioAPI, node: Element): TeamInfo {
  const team = $(node);

  return {
    teamKey: childText(team, "team_key"),
    teamName: childText(team, "name") || "Unknown Team",
    teamLogo: cleanText(team.children("team_logos").children("team_logo").first().children("url").text()),
    manager:
      cleanText(team.children("managers").children("manager").first().children("nickname").text()) ||
      "Unknown Manager",
  };
}

function childText(node: Cheerio<Element>, tag: string): string {
  return cleanText(node.children(tag).first().text());
}

function toPlayerRole(positionType: string): PlayerRole | null {
  if (positionType === "B") {
    return "batter";
  }

  if (positionType === "P") {
    return "pitcher";
  }

  return null;
}

function firstNonEmpty(...values: Array<string | undefined>): string | null {
  for (const value of values) {
    if (typeof value === "string" && value.trim().length > 0) {
      return value.trim();
    }
  }

  return null;
}

function formatYahooError(error: unknown): string {
  if (error instanceof AxiosError) {
    const status = error.response?.status;
    const data = error.response?.data;
    const detail = typeof data === "string" ? cleanText(data).slice(0, 300) : JSON.stringify(data ?? {});

    if (status) {
      return `Yahoo request failed (${status}): ${detail}`;
    }

    return `Yahoo request failed: ${error.message}`;
  }

  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}
