import { describe, expect, it } from "vitest";
import { PlayerNameIndex, matchPlayerName } from "../src/identity/matcher";

describe("player name matcher", () => {
  it("matches exactly after normalization", () => {
    expect(matchPlayerName("Jose Ramirez", ["Juan Soto", "José Ramírez"])).toBe("José Ramírez");
    expect(matchPlayerName("Mike Trout (Batter)", ["Mike Trout"])).toBe("Mike Trout");
  });

  it("prefers an exact match over a suffix match", () => {
    expect(matchPlayerName("Bobby Witt Jr.", ["Bobby Witt Jr", "Bobby Witt"])).toBe("Bobby Witt Jr");
    expect(matchPlayerName("Bobby Witt Jr.", ["Bobby Witt", "Bobby Witt Jr."])).toBe("Bobby Witt Jr.");
  });

  it("ignores generational suffixes on either side", () => {
    const index = new PlayerNameIndex(["Vladimir Guerrero Jr."]);
    expect(index.resolve("Vladimir Guerrero")).toEqual({ candidate: "Vladimir Guerrero Jr.", tier: "suffix" });
    expect(matchPlayerName("Ken Griffey II", ["Ken Griffey"])).toBe("Ken Griffey");
  });

  it("falls back to surname and first initial", () => {
    expect(matchPlayerName("J. Smith", ["Jake Smith", "John Smith"])).toBe("Jake Smith");
    expect(matchPlayerName("J. Smith", ["John Smith", "Jake Smith"])).toBe("John Smith");
    expect(new PlayerNameIndex(["Jake Smith"]).resolve("J. Smith")).toEqual({
      candidate: "Jake Smith",
      tier: "initial",
    });
  });

  it("does not use the initial tier for single-token names", () => {
    expect(matchPlayerName("Smith", ["John Smith"])).toBeNull();
    expect(matchPlayerName("Ichiro", ["Ichiro"])).toBe("Ichiro");
  });

  it("returns null when nothing matches", () => {
    expect(matchPlayerName("Unknown Player", [])).toBeNull();
    expect(matchPlayerName("Unknown Player", ["Known Player", "Another Name"])).toBeNull();
  });

  it("returns the first candidate in pool order on ties", () => {
    expect(matchPlayerName("Will Smith", ["Will Smith", "Will Smith"])).toBe("Will Smith");
    expect(new PlayerNameIndex(["A One", "B Two"]).size).toBe(2);
  });
});
