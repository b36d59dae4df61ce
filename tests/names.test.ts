import { describe, expect, it } from "vitest";
import { normalizePlayerName, repairEscapedBytes, repairMojibake } from "../src/identity/names";

describe("player name normalizer", () => {
  it("folds accents and case", () => {
    expect(normalizePlayerName("José Ramírez")).toBe("jose ramirez");
    expect(normalizePlayerName("Jose Ramirez")).toBe("jose ramirez");
    expect(normalizePlayerName("Ronald Acuña Jr.")).toBe("ronald acuna jr.");
  });

  it("drops role parentheticals in any case", () => {
    expect(normalizePlayerName("Mike Trout (Batter)")).toBe("mike trout");
    expect(normalizePlayerName("Mike Trout")).toBe("mike trout");
    expect(normalizePlayerName("Shohei Ohtani (PITCHER)")).toBe("shohei ohtani");
  });

  it("keeps other parentheticals", () => {
    expect(normalizePlayerName("Will Smith (LAD)")).toBe("will smith (lad)");
  });

  it("collapses and trims whitespace", () => {
    expect(normalizePlayerName("  Mike \t  TROUT \n")).toBe("mike trout");
  });

  it("returns an empty key for empty input", () => {
    expect(normalizePlayerName("")).toBe("");
    expect(normalizePlayerName(null)).toBe("");
    expect(normalizePlayerName(undefined)).toBe("");
    expect(normalizePlayerName("   ")).toBe("");
  });

  it("repairs latin-1 mojibake", () => {
    expect(normalizePlayerName("Jos\u00c3\u00a9 Ram\u00c3\u00adrez")).toBe("jose ramirez");
  });

  it("repairs literal escaped byte runs", () => {
    expect(normalizePlayerName("Jos\\xc3\\xa9 Abreu")).toBe("jose abreu");
    expect(normalizePlayerName("Jos\\XC3\\XA9 Abreu")).toBe("jose abreu");
  });

  it("keeps folding until tags and escapes uncovered by earlier steps are gone", () => {
    expect(normalizePlayerName("Mike Trout \\x28Batter\\x29")).toBe("mike trout");
    expect(normalizePlayerName("Jos\\x\u0301c3\\xa9")).toBe("jose");
    expect(normalizePlayerName("\u00df\u0301\u00bf")).toBe("\u07ff");
  });

  it("is idempotent", () => {
    const samples = [
      "José Ramírez",
      "Mike Trout (Batter)",
      "Jos\u00c3\u00a9 Ram\u00c3\u00adrez",
      "Jos\\xc3\\xa9 Abreu",
      "  Vladimir   Guerrero Jr. ",
      "Ñandú Ölçer",
      "Mike Trout \\x28Batter\\x29",
      "Jos\\x\u0301c3\\xa9",
      "\u00df\u0301\u00bf",
      "",
    ];

    for (const sample of samples) {
      const once = normalizePlayerName(sample);
      expect(normalizePlayerName(once)).toBe(once);
    }
  });
});

describe("encoding repair", () => {
  it("leaves escape runs that are not valid UTF-8 as written", () => {
    expect(repairEscapedBytes("Bad\\xffName")).toBe("Bad\\xffName");
  });

  it("leaves correct text alone", () => {
    expect(repairMojibake("José")).toBe("José");
    expect(repairMojibake("Plain Name")).toBe("Plain Name");
  });

  it("leaves text with characters outside latin-1 alone", () => {
    expect(repairMojibake("Ã© ć")).toBe("Ã© ć");
  });
});
