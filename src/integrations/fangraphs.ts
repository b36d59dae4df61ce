import axios, { AxiosError } from "axios";
import { load } from "cheerio";
import { z } from "zod";
import { TtlCache } from "../utils/cache";
import { roundTo, toStatNumber } from "../utils/number";
import { cleanText } from "../utils/text";
import type { StatRecord, StatRow, StatsDataSource } from "../types";

const LEADERS_ENDPOINT = "https://www.fangraphs.com/api/leaders/major-league/data";
const CACHE_TTL_MS = 6 * 60 * 60 * 1000;
const DEFAULT_TIMEOUT_MS = 120_000;

type LeaderboardKind = "bat" | "pit";

interface FieldSpec {
  key: string;
  places?: number;
  optional?: boolean;
}

const BATTING_FIELDS: FieldSpec[] = [
  { key: "G" },
  { key: "AB" },
  { key: "PA" },
  { key: "H" },
  { key: "2B" },
  { key: "3B" },
  { key: "HR" },
  { key: "R" },
  { key: "RBI" },
  { key: "BB" },
  { key: "SO" },
  { key: "SB" },
  { key: "CS" },
  { key: "HBP" },
  { key: "AVG", places: 3 },
  { key: "OBP", places: 3 },
  { key: "SLG", places: 3 },
  { key: "OPS", places: 3 },
];

const PITCHING_FIELDS: FieldSpec[] = [
  { key: "G" },
  { key: "GS" },
  { key: "W" },
  { key: "L" },
  { key: "SV" },
  { key: "HLD", optional: true },
  { key: "IP", places: 1 },
  { key: "H" },
  { key: "ER" },
  { key: "HR" },
  { key: "BB" },
  { key: "SO" },
  { key: "CG", optional: true },
  { key: "ShO", optional: true },
  { key: "QS", optional: true },
  { key: "ERA", places: 2 },
  { key: "WHIP", places: 2 },
  { key: "K/9", places: 2 },
  { key: "BB/9", places: 2 },
];

const leaderboardSchema = z.object({
  data: z.array(z.record(z.string(), z.unknown())),
});

export type LeaderboardRow = Record<string, unknown>;

export interface FanGraphsClientOptions {
  timeoutMs?: number;
  endpoint?: string;
}

export class FanGraphsClient implements StatsDataSource {
  private readonly cache = new TtlCache<string, StatRow[]>();
  private readonly timeoutMs: number;
  private readonly endpoint: string;

  constructor(options: FanGraphsClientOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.endpoint = options.endpoint ?? LEADERS_ENDPOINT;
  }

  async getBattingStats(season: number): Promise<StatRow[]> {
    return this.leaderboard("bat", season);
  }

  async getPitchingStats(season: number): Promise<StatRow[]> {
    return this.leaderboard("pit", season);
  }

  private async leaderboard(kind: LeaderboardKind, season: number): Promise<StatRow[]> {
    return this.cache.getOrLoad(`${kind}:${season}`, CACHE_TTL_MS, async () => {
      const body = await this.fetchLeaderboard(kind, season);
      const parsed = leaderboardSchema.safeParse(body);
      if (!parsed.success) {
        throw new Error(`FanGraphs ${kind} leaderboard for ${season} had an unexpected shape.`);
      }

      return kind === "bat" ? toBattingRows(parsed.data.data) : toPitchingRows(parsed.data.data);
    });
  }

  private async fetchLeaderboard(kind: LeaderboardKind, season: number): Promise<unknown> {
    try {
      const response = await axios.get<unknown>(this.endpoint, {
        params: {
          pos: "all",
          stats: kind,
          lg: "all",
          qual: "1",
          season,
          season1: season,
          month: "0",
          team: "0",
          ind: "0",
          rost: "0",
          type: "8",
          pageitems: "2000000000",
          pagenum: "1",
        },
        timeout: this.timeoutMs,
        responseType: "json",
      });

      return response.data;
    } catch (error) {
      throw new Error(formatFanGraphsError(error));
    }
  }
}

export function toBattingRows(rows: readonly LeaderboardRow[]): StatRow[] {
  return rows.map((row) => toStatRow(row, BATTING_FIELDS)).filter((row): row is StatRow => row !== null);
}

export function toPitchingRows(rows: readonly LeaderboardRow[]): StatRow[] {
  return rows.map((row) => toStatRow(row, PITCHING_FIELDS)).filter((row): row is StatRow => row !== null);
}

function toStatRow(row: LeaderboardRow, fields: readonly FieldSpec[]): StatRow | null {
  const name = plainText(row.PlayerName) || plainText(row.Name);
  if (!name) {
    return null;
  }

  const stats: StatRecord = {};
  for (const field of fields) {
    if (field.optional && !(field.key in row)) {
      continue;
    }

    const value = toStatNumber(row[field.key]);
    stats[field.key] = field.places === undefined ? Math.trunc(value) : roundTo(value, field.places);
  }

  return {
    name,
    team: plainText(row.TeamNameAbb) || plainText(row.Team),
    stats,
  };
}

/** Leaderboard name and team cells may arrive wrapped in anchor markup. */
function plainText(value: unknown): string {
  if (typeof value !== "string" || value.length === 0) {
    return "";
  }

  if (!value.includes("<")) {
    return cleanText(value);
  }

  return cleanText(load(value, null, false).root().text());
}

function formatFanGraphsError(error: unknown): string {
  if (error instanceof AxiosError) {
    const status = error.response?.status;
    if (status) {
      return `FanGraphs request failed (${status})`;
    }

    return `FanGraphs request failed: ${error.message}`;
  }

  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}
