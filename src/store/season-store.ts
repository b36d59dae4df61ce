import fs from "fs/promises";
import path from "path";

export type SeasonScope = "current" | number;

export const SEASON_ARTIFACTS = [
  "standings",
  "final_standings",
  "teams",
  "all_scores",
  "draft",
  "player_stats",
  "transactions",
  "scoring_settings",
] as const;

export type SeasonArtifact = (typeof SEASON_ARTIFACTS)[number];

/**
 * JSON files under the data directory. Every collection run rewrites whole
 * files; nothing is patched in place.
 */
export class SeasonStore {
  constructor(readonly dataDir: string) {}

  async ensureLayout(): Promise<void> {
    for (const dir of ["current_season", "historical", "managers", "players"]) {
      await fs.mkdir(path.join(this.dataDir, dir), { recursive: true });
    }
  }

  seasonDir(scope: SeasonScope): string {
    return scope === "current"
      ? path.join(this.dataDir, "current_season")
      : path.join(this.dataDir, "historical", String(scope));
  }

  seasonFile(scope: SeasonScope, artifact: SeasonArtifact | `week_${number}_scores`): string {
    return path.join(this.seasonDir(scope), `${artifact}.json`);
  }

  async writeSeason(scope: SeasonScope, artifact: SeasonArtifact | `week_${number}_scores`, payload: unknown): Promise<string> {
    return this.writeJson(this.seasonFile(scope, artifact), payload);
  }

  async readSeason<T>(scope: SeasonScope, artifact: SeasonArtifact): Promise<T | null> {
    return this.readJson<T>(this.seasonFile(scope, artifact));
  }

  async writeData(relativePath: string, payload: unknown): Promise<string> {
    return this.writeJson(path.join(this.dataDir, relativePath), payload);
  }

  async readData<T>(relativePath: string): Promise<T | null> {
    return this.readJson<T>(path.join(this.dataDir, relativePath));
  }

  private async writeJson(filePath: string, payload: unknown): Promise<string> {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, JSON.stringify(payload, null, 2), "utf8");
    return filePath;
  }

  private async readJson<T>(filePath: string): Promise<T | null> {
    try {
      const raw = await fs.readFile(filePath, "utf8");
      return JSON.parse(raw) as T;
    } catch (error) {
      const code = (error as NodeJS.ErrnoException | undefined)?.code;
      if (code === "ENOENT") {
        return null;
      }
      throw error;
    }
  }
}
