import fs from "fs/promises";
import path from "path";
import { z } from "zod";

const seasonKey = z.string().regex(/^\d{4}$/, "expected a four-digit season");
const season = z.number().int().min(1900).max(2999);

const managerIdentityRuleSchema = z.object({
  manager: z.string().min(1),
  fromYear: season.optional(),
  toYear: season.optional(),
  teamKey: z.string().min(1).optional(),
  teamKeySuffix: z.string().min(1).optional(),
  teamNameIncludes: z.array(z.string().min(1)).min(1).optional(),
  resolvedName: z.string().min(1),
});

export const leagueConfigSchema = z.object({
  leagueName: z.string().min(1),
  currentSeason: season,
  historicalSeasons: z.array(season).default([]),
  leagueIdOverrides: z.record(seasonKey, z.string().min(1)).default({}),
  totalTeams: z.number().int().positive().default(12),
  leagueType: z.string().min(1).default("Points"),
  playoffTeams: z.number().int().positive().default(6),
  historicalWeeks: z.number().int().positive().default(24),
  currentSeasonWeeks: z.number().int().positive().default(26),
  managerNameMap: z.record(z.string(), z.string().min(1)).default({}),
  managerTeamOverrides: z.record(seasonKey, z.record(z.string(), z.string().min(1))).default({}),
  managerIdentityRules: z.array(managerIdentityRuleSchema).default([]),
  rankCorrections: z.record(seasonKey, z.record(z.string(), z.number().int().positive())).default({}),
});

export type LeagueConfig = z.infer<typeof leagueConfigSchema>;
export type ManagerIdentityRule = z.infer<typeof managerIdentityRuleSchema>;

export interface RuntimeEnv {
  dataDir: string;
  leagueConfigPath: string;
  port: number;
}

export function resolveRuntimeEnv(env: NodeJS.ProcessEnv = process.env): RuntimeEnv {
  const port = Number.parseInt(env.PORT ?? "8787", 10);

  return {
    dataDir: resolveFromCwd(env.DATA_DIR, "data"),
    leagueConfigPath: resolveFromCwd(env.LEAGUE_CONFIG_FILE, "config/league.json"),
    port: Number.isFinite(port) && port > 0 ? port : 8787,
  };
}

export async function loadLeagueConfig(filePath: string): Promise<LeagueConfig> {
  const raw = await fs.readFile(filePath, "utf8");

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new Error(`League config ${filePath} is not valid JSON: ${(error as Error).message}`);
  }

  return parseLeagueConfig(parsed, filePath);
}

export function parseLeagueConfig(input: unknown, source = "league config"): LeagueConfig {
  const result = leagueConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid ${source}: ${issues}`);
  }

  return result.data;
}

/** Looks up a per-season entry in a map keyed by four-digit season strings. */
export function forSeason<T>(bySeason: Record<string, T>, year: number): T | null {
  const key = String(year);
  return Object.prototype.hasOwnProperty.call(bySeason, key) ? bySeason[key] : null;
}

export function allSeasons(config: LeagueConfig): number[] {
  return Array.from(new Set([...config.historicalSeasons, config.currentSeason])).sort((a, b) => a - b);
}

function resolveFromCwd(configured: string | undefined, fallback: string): string {
  const value = configured?.trim() || fallback;
  return path.isAbsolute(value) ? value : path.resolve(process.cwd(), value);
}
