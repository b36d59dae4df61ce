import type { ScoringTable } from "../types";

// Points-league defaults, used for every stat the league itself does not declare.
export const DEFAULT_BATTING_SCORING: Readonly<ScoringTable> = Object.freeze({
  "1B": 2.6,
  "2B": 5.2,
  "3B": 7.8,
  HR: 10.4,
  RBI: 1.9,
  R: 1.9,
  BB: 2.6,
  HBP: 2.6,
  SB: 4.2,
  CS: -2.6,
  SO: -1, // batter strikeouts
});

export const DEFAULT_PITCHING_SCORING: Readonly<ScoringTable> = Object.freeze({
  IP: 5,
  W: 4,
  L: -4,
  SV: 8,
  HLD: 4,
  ER: -3,
  HA: -1,
  BBA: -1,
  K: 3,
  QS: 4,
  CG: 5,
  SO: 5, // shutouts
});

/**
 * Provider pitching columns to the league's scoring keys. Hits, walks and
 * strikeouts share abbreviations with the batting side, so they are renamed
 * before lookup.
 */
export const PITCHING_STAT_KEYS: Readonly<Record<string, string>> = Object.freeze({
  IP: "IP",
  W: "W",
  L: "L",
  SV: "SV",
  HLD: "HLD",
  ER: "ER",
  H: "HA",
  BB: "BBA",
  SO: "K",
  QS: "QS",
  CG: "CG",
  ShO: "SO",
});
