import express from "express";
import fs from "fs/promises";
import path from "path";
import { normalizePlayerName } from "./identity/names";
import { SEASON_ARTIFACTS, SeasonStore, type SeasonArtifact, type SeasonScope } from "./store/season-store";
import type { PlayerCareerRecord } from "./types";

type JsonFileCache = Map<string, { mtimeMs: number; payload: unknown }>;

/** Read-only JSON API over the files a collection run leaves in the store. */
export function createApp(store: SeasonStore): express.Express {
  const jsonFileCache: JsonFileCache = new Map();
  const app = express();

  const sendJsonFile = async (res: express.Response, filePath: string): Promise<void> => {
    const payload = await loadJsonFile(jsonFileCache, filePath);
    if (payload === null) {
      res.status(404).json({ error: `${path.basename(filePath)} has not been generated yet.` });
      return;
    }

    res.json(payload);
  };

  app.use(express.json());
  app.use("/api", (_req, res, next) => {
    res.setHeader("Cache-Control", "no-store, no-cache, must-revalidate, proxy-revalidate");
    res.setHeader("Pragma", "no-cache");
    res.setHeader("Expires", "0");
    next();
  });

  app.get("/health", (_req, res) => {
    res.json({ ok: true, now: new Date().toISOString(), dataDir: store.dataDir });
  });

  app.get("/api/league", async (_req, res, next) => {
    try {
      await sendJsonFile(res, path.join(store.dataDir, "league_info.json"));
    } catch (error) {
      next(error);
    }
  });

  app.get("/api/seasons/:season/:artifact", async (req, res, next) => {
    try {
      const scope = parseSeasonScope(req.params.season);
      const artifact = parseArtifact(req.params.artifact);
      if (scope === null || artifact === null) {
        res.status(404).json({ error: `Unknown season artifact: ${req.params.season}/${req.params.artifact}` });
        return;
      }

      await sendJsonFile(res, store.seasonFile(scope, artifact));
    } catch (error) {
      next(error);
    }
  });

  app.get("/api/managers", async (_req, res, next) => {
    try {
      await sendJsonFile(res, path.join(store.dataDir, "managers", "all_time_stats.json"));
    } catch (error) {
      next(error);
    }
  });

  app.get("/api/managers/history", async (_req, res, next) => {
    try {
      await sendJsonFile(res, path.join(store.dataDir, "managers", "manager_history.json"));
    } catch (error) {
      next(error);
    }
  });

  app.get("/api/players/history", async (_req, res, next) => {
    try {
      await sendJsonFile(res, path.join(store.dataDir, "players", "player_history.json"));
    } catch (error) {
      next(error);
    }
  });

  app.get("/api/players/:name", async (req, res, next) => {
    try {
      const history = await loadJsonFile(jsonFileCache, path.join(store.dataDir, "players", "player_history.json"));
      const key = normalizePlayerName(req.params.name);
      const career =
        isCareerMap(history) && key && Object.prototype.hasOwnProperty.call(history, key) ? history[key] : undefined;

      if (!career) {
        res.status(404).json({ error: `No career history for ${req.params.name}` });
        return;
      }

      res.json({ key, ...career });
    } catch (error) {
      next(error);
    }
  });

  app.use((error: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    const message = error instanceof Error ? error.message : "Unexpected error";
    res.status(500).json({ error: message });
  });

  return app;
}

// Reparses only when the file's mtime moves.
async function loadJsonFile(cache: JsonFileCache, filePath: string): Promise<unknown> {
  let mtimeMs: number;
  try {
    mtimeMs = (await fs.stat(filePath)).mtimeMs;
  } catch (error) {
    const code = (error as NodeJS.ErrnoException | undefined)?.code;
    if (code === "ENOENT") {
      return null;
    }
    throw error;
  }

  const cached = cache.get(filePath);
  if (cached && cached.mtimeMs === mtimeMs) {
    return cached.payload;
  }

  const payload: unknown = JSON.parse(await fs.readFile(filePath, "utf8"));
  cache.set(filePath, { mtimeMs, payload });
  return payload;
}

export function parseSeasonScope(value: string): SeasonScope | null {
  if (value === "current") {
    return value;
  }

  return /^\d{4}$/.test(value) ? Number.parseInt(value, 10) : null;
}

export function parseArtifact(value: string): SeasonArtifact | `week_${number}_scores` | null {
  const known = SEASON_ARTIFACTS.find((artifact) => artifact === value);
  if (known) {
    return known;
  }

  const week = value.match(/^week_(\d{1,2})_scores$/);
  return week ? `week_${Number.parseInt(week[1], 10)}_scores` : null;
}

function isCareerMap(value: unknown): value is Record<string, PlayerCareerRecord> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}
