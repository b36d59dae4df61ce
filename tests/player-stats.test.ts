import { describe, expect, it } from "vitest";
import { buildPlayerCareers } from "../src/pipelines/player-careers";
import { buildPlayerSeasonStats, describeUnmatched } from "../src/pipelines/player-stats";
import { defaultScoringTables } from "../src/scoring/tables";
import type { PlayerRole, PlayerSeasonRecord, RosterEntry, StatRow } from "../src/types";

function rosterEntry(name: string, role: PlayerRole, overrides: Partial<RosterEntry> = {}): RosterEntry {
  return {
    playerId: name.toLowerCase().replace(/\W+/g, "-"),
    playerKey: null,
    name,
    role,
    eligiblePositions: role === "batter" ? ["Util"] : ["P"],
    primaryPosition: role === "batter" ? "Util" : "P",
    selectedPosition: "BN",
    status: "",
    teamKey: "431.l.1.t.1",
    teamName: "Test Nine",
    teamLogo: "",
    manager: "Ryan",
    ...overrides,
  };
}

const batting: StatRow[] = [
  { name: "Jose Ramirez", team: "CLE", stats: { H: 10, "2B": 2, "3B": 1, HR: 2 } },
  { name: "Bobby Witt", team: "KCR", stats: { "1B": 1 } },
];

const pitching: StatRow[] = [{ name: "Tarik Skubal", team: "DET", stats: { IP: 6, W: 1, ER: 2, H: 4, BB: 1, SO: 7 } }];

describe("season player stats", () => {
  it("matches each roster entry against its role's pool and sorts by points", () => {
    const result = buildPlayerSeasonStats({
      roster: [
        rosterEntry("José Ramírez", "batter"),
        rosterEntry("Bobby Witt Jr.", "batter"),
        rosterEntry("Tarik Skubal", "pitcher"),
        rosterEntry("Nobody Here", "batter"),
      ],
      batting,
      pitching,
      tables: defaultScoringTables(),
    });

    expect(result.players.map((player) => [player.name, player.fantasyPoints])).toEqual([
      ["José Ramírez", 52],
      ["Tarik Skubal", 44],
      ["Bobby Witt Jr.", 2.6],
      ["Nobody Here", 0],
    ]);
    expect(result.unmatched).toEqual(["Nobody Here (B)"]);
    expect(result.matchedCount).toBe(3);

    const [ramirez] = result.players;
    expect(ramirez.stats).toEqual({ H: 10, "2B": 2, "3B": 1, HR: 2, "1B": 5 });
    expect(ramirez.mlbTeam).toBe("CLE");
    expect(ramirez.matchedName).toBe("Jose Ramirez");
    expect(ramirez.teamName).toBe("Test Nine");
  });

  it("keeps unmatched players with an empty line", () => {
    const result = buildPlayerSeasonStats({
      roster: [rosterEntry("Jose Ramirez", "pitcher")],
      batting,
      pitching,
      tables: defaultScoringTables(),
    });

    expect(result.players[0]).toMatchObject({
      name: "Jose Ramirez",
      stats: {},
      fantasyPoints: 0,
      mlbTeam: "",
      matchedName: null,
    });
    expect(result.unmatched).toEqual(["Jose Ramirez (P)"]);
    expect(result.matchedCount).toBe(0);
  });

  it("keeps players without a batting or pitching type out of matching", () => {
    const result = buildPlayerSeasonStats({
      roster: [
        rosterEntry("Tarik Skubal", "pitcher"),
        rosterEntry("Jose Ramirez", "batter", { role: null, eligiblePositions: [], primaryPosition: "" }),
      ],
      batting,
      pitching,
      tables: defaultScoringTables(),
    });

    expect(result.players[1]).toMatchObject({
      name: "Jose Ramirez",
      role: null,
      stats: {},
      fantasyPoints: 0,
      mlbTeam: "",
      matchedName: null,
    });
    expect(result.unmatched).toEqual([]);
    expect(result.matchedCount).toBe(1);
  });

  it("returns the roster in order when no stats are available", () => {
    const result = buildPlayerSeasonStats({
      roster: [rosterEntry("First Guy", "pitcher"), rosterEntry("Second Guy", "batter")],
      batting: [],
      pitching: [],
      tables: defaultScoringTables(),
    });

    expect(result.players.map((player) => player.name)).toEqual(["First Guy", "Second Guy"]);
    expect(result.unmatched).toEqual([]);
    expect(result.matchedCount).toBe(0);
  });

  it("coerces string stat cells in the stored line", () => {
    const result = buildPlayerSeasonStats({
      roster: [rosterEntry("Test Slugger", "batter")],
      batting: [{ name: "Test Slugger", team: "TST", stats: { "1B": "3", RBI: "bad" } }],
      pitching: [],
      tables: defaultScoringTables(),
    });

    expect(result.players[0].stats).toEqual({ "1B": 3, RBI: 0 });
    expect(result.players[0].fantasyPoints).toBe(7.8);
  });
});

describe("unmatched summary", () => {
  it("lists short lists and counts long ones", () => {
    expect(describeUnmatched([])).toBeNull();
    expect(describeUnmatched(["A (B)", "C (P)"])).toBe("Unmatched: A (B), C (P)");
    expect(describeUnmatched(["A (B)", "C (P)", "D (B)"], 2)).toBe("3 unmatched players");
  });
});

describe("player careers", () => {
  function seasonRecord(name: string, fantasyPoints: number, teamName: string): PlayerSeasonRecord {
    return {
      ...rosterEntry(name, "batter", { teamName }),
      stats: { HR: 1 },
      fantasyPoints,
      mlbTeam: "TST",
      matchedName: name,
    };
  }

  it("groups seasons by normalized name and keeps the first spelling", () => {
    const careers = buildPlayerCareers([
      { year: 2023, players: [seasonRecord("José Ramírez", 52.3, "Test Nine"), seasonRecord("", 10, "Ghosts")] },
      { year: 2024, players: [seasonRecord("Jose Ramirez", 40.2, "Other Nine")] },
    ]);

    expect(Object.keys(careers)).toEqual(["jose ramirez"]);
    const career = careers["jose ramirez"];
    expect(career.name).toBe("José Ramírez");
    expect(career.careerFantasyPoints).toBe(92.5);
    expect(career.seasons.map((season) => [season.year, season.teamName, season.fantasyPoints])).toEqual([
      [2023, "Test Nine", 52.3],
      [2024, "Other Nine", 40.2],
    ]);
  });
});
