import { roundToTenth, toStatNumber } from "../utils/number";
import type { ScoringTable, StatRecord } from "../types";
import { PITCHING_STAT_KEYS } from "./defaults";

export function scoreBatting(stats: StatRecord, scoring: ScoringTable): number {
  const line = withDerivedSingles(stats);
  let points = 0;

  for (const [stat, multiplier] of Object.entries(scoring)) {
    if (!hasStat(line, stat)) {
      continue;
    }

    points += toStatNumber(line[stat]) * multiplier;
  }

  return roundToTenth(points);
}

export function scorePitching(stats: StatRecord, scoring: ScoringTable): number {
  let points = 0;

  for (const [sourceStat, scoringStat] of Object.entries(PITCHING_STAT_KEYS)) {
    if (!hasStat(stats, sourceStat)) {
      continue;
    }

    const multiplier = scoring[scoringStat];
    if (multiplier === undefined) {
      continue;
    }

    points += toStatNumber(stats[sourceStat]) * multiplier;
  }

  return roundToTenth(points);
}

/**
 * Adds `1B = H - 2B - 3B - HR` when the provider gave hits but no singles.
 * A negative result means the provider's hit breakdown is inconsistent; it is
 * kept as computed.
 */
export function withDerivedSingles(stats: StatRecord): StatRecord {
  if (hasStat(stats, "1B") || !hasStat(stats, "H")) {
    return stats;
  }

  const singles =
    toStatNumber(stats.H) - toStatNumber(stats["2B"]) - toStatNumber(stats["3B"]) - toStatNumber(stats.HR);

  return { ...stats, "1B": singles };
}

function hasStat(stats: StatRecord, stat: string): boolean {
  return Object.prototype.hasOwnProperty.call(stats, stat) && stats[stat] !== null && stats[stat] !== undefined;
}
