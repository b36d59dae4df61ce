import axios, { type AxiosInstance } from "axios";
import fs from "fs/promises";
import type { Server } from "http";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createApp, parseArtifact, parseSeasonScope } from "../src/app";
import { SeasonStore } from "../src/store/season-store";

describe("read api", () => {
  let dataDir: string;
  let store: SeasonStore;
  let server: Server;
  let client: AxiosInstance;

  async function writeJson(relativePath: string, payload: unknown): Promise<string> {
    const filePath = path.join(dataDir, relativePath);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, JSON.stringify(payload), "utf8");
    return filePath;
  }

  beforeEach(async () => {
    dataDir = await fs.mkdtemp(path.join(os.tmpdir(), "api-"));
    store = new SeasonStore(dataDir);
    const app = createApp(store);

    server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, "127.0.0.1", () => resolve(listening));
    });
    const address = server.address();
    const port = typeof address === "object" && address !== null ? address.port : 0;
    client = axios.create({ baseURL: `http://127.0.0.1:${port}`, validateStatus: () => true });
  });

  afterEach(async () => {
    await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
    await fs.rm(dataDir, { recursive: true, force: true });
  });

  it("reports the data directory on the health check", async () => {
    const response = await client.get("/health");

    expect(response.status).toBe(200);
    expect(response.data).toMatchObject({ ok: true, dataDir });
  });

  it("serves league info without caching headers", async () => {
    await writeJson("league_info.json", { leagueName: "Test League", currentSeason: 2025 });
    const response = await client.get("/api/league");

    expect(response.status).toBe(200);
    expect(response.data).toEqual({ leagueName: "Test League", currentSeason: 2025 });
    expect(response.headers["cache-control"]).toBe("no-store, no-cache, must-revalidate, proxy-revalidate");
  });

  it("answers 404 for files that have not been generated", async () => {
    const response = await client.get("/api/managers");

    expect(response.status).toBe(404);
    expect(response.data).toEqual({ error: "all_time_stats.json has not been generated yet." });
  });

  it("reads the current season and past seasons from their own directories", async () => {
    await writeJson("current_season/standings.json", [{ rank: 1, manager: "Ryan" }]);
    await writeJson("historical/2024/final_standings.json", [{ rank: 1, manager: "Rich" }]);

    const current = await client.get("/api/seasons/current/standings");
    const past = await client.get("/api/seasons/2024/final_standings");
    const missing = await client.get("/api/seasons/2024/standings");

    expect(current.data).toEqual([{ rank: 1, manager: "Ryan" }]);
    expect(past.data).toEqual([{ rank: 1, manager: "Rich" }]);
    expect(missing.status).toBe(404);
    expect(missing.data).toEqual({ error: "standings.json has not been generated yet." });
  });

  it("reads week files with or without a leading zero", async () => {
    await writeJson("historical/2024/week_7_scores.json", [{ week: 7, teamScore: 101 }]);
    const response = await client.get("/api/seasons/2024/week_07_scores");

    expect(response.status).toBe(200);
    expect(response.data).toEqual([{ week: 7, teamScore: 101 }]);
  });

  it("rejects unknown artifacts and malformed seasons", async () => {
    const artifact = await client.get("/api/seasons/2024/secrets");
    const season = await client.get("/api/seasons/24/standings");

    expect(artifact.status).toBe(404);
    expect(artifact.data).toEqual({ error: "Unknown season artifact: 2024/secrets" });
    expect(season.status).toBe(404);
    expect(season.data).toEqual({ error: "Unknown season artifact: 24/standings" });
  });

  it("looks players up by their normalized name", async () => {
    await writeJson("players/player_history.json", {
      "jose ramirez": { name: "José Ramírez", seasons: [], careerFantasyPoints: 52 },
    });

    const found = await client.get(`/api/players/${encodeURIComponent("José Ramírez (Batter)")}`);
    const unknown = await client.get("/api/players/Nobody");

    expect(found.status).toBe(200);
    expect(found.data).toEqual({ key: "jose ramirez", name: "José Ramírez", seasons: [], careerFantasyPoints: 52 });
    expect(unknown.status).toBe(404);
    expect(unknown.data).toEqual({ error: "No career history for Nobody" });
  });

  it("rereads a file only after its modification time changes", async () => {
    const filePath = await writeJson("managers/manager_history.json", [{ manager: "Ryan", year: 2024 }]);
    const firstStamp = new Date("2025-01-01T00:00:00.000Z");
    await fs.utimes(filePath, firstStamp, firstStamp);
    expect((await client.get("/api/managers/history")).data).toEqual([{ manager: "Ryan", year: 2024 }]);

    await fs.writeFile(filePath, JSON.stringify([{ manager: "Rich", year: 2025 }]), "utf8");
    await fs.utimes(filePath, firstStamp, firstStamp);
    expect((await client.get("/api/managers/history")).data).toEqual([{ manager: "Ryan", year: 2024 }]);

    const secondStamp = new Date("2025-01-02T00:00:00.000Z");
    await fs.utimes(filePath, secondStamp, secondStamp);
    expect((await client.get("/api/managers/history")).data).toEqual([{ manager: "Rich", year: 2025 }]);
  });

  it("answers 500 with the error for a corrupt file", async () => {
    await fs.mkdir(path.join(dataDir, "players"), { recursive: true });
    await fs.writeFile(path.join(dataDir, "players", "player_history.json"), "{ truncated", "utf8");
    const response = await client.get("/api/players/history");

    expect(response.status).toBe(500);
    expect(typeof response.data.error).toBe("string");
  });
});

describe("route parameters", () => {
  it("accepts current or a four digit year", () => {
    expect(parseSeasonScope("current")).toBe("current");
    expect(parseSeasonScope("2019")).toBe(2019);
    expect(parseSeasonScope("19")).toBeNull();
  });

  it("normalizes week numbers and rejects other names", () => {
    expect(parseArtifact("draft")).toBe("draft");
    expect(parseArtifact("week_07_scores")).toBe("week_7_scores");
    expect(parseArtifact("week_123_scores")).toBeNull();
    expect(parseArtifact("league_info")).toBeNull();
  });
});
