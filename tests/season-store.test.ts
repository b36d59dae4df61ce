import fs from "fs/promises";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { SeasonStore } from "../src/store/season-store";

describe("season store", () => {
  let dataDir: string;
  let store: SeasonStore;

  beforeEach(async () => {
    dataDir = await fs.mkdtemp(path.join(os.tmpdir(), "season-store-"));
    store = new SeasonStore(dataDir);
  });

  afterEach(async () => {
    await fs.rm(dataDir, { recursive: true, force: true });
  });

  it("creates the directory layout", async () => {
    await store.ensureLayout();
    const entries = (await fs.readdir(dataDir)).sort();
    expect(entries).toEqual(["current_season", "historical", "managers", "players"]);
  });

  it("places current and historical artifacts apart", () => {
    expect(store.seasonFile("current", "standings")).toBe(path.join(dataDir, "current_season", "standings.json"));
    expect(store.seasonFile(2021, "week_3_scores")).toBe(path.join(dataDir, "historical", "2021", "week_3_scores.json"));
  });

  it("round-trips season artifacts as pretty JSON", async () => {
    const file = await store.writeSeason(2022, "draft", [{ pick: 1 }]);

    expect(await fs.readFile(file, "utf8")).toBe('[\n  {\n    "pick": 1\n  }\n]');
    expect(await store.readSeason<Array<{ pick: number }>>(2022, "draft")).toEqual([{ pick: 1 }]);
  });

  it("returns null for artifacts not written yet", async () => {
    expect(await store.readSeason(2019, "final_standings")).toBeNull();
    expect(await store.readData("players/player_history.json")).toBeNull();
  });

  it("writes data files into nested directories", async () => {
    const file = await store.writeData("managers/all_time_stats.json", []);
    expect(file).toBe(path.join(dataDir, "managers", "all_time_stats.json"));
    expect(await store.readData("managers/all_time_stats.json")).toEqual([]);
  });
});
