import type { LeagueStatSetting, ScoringTable, ScoringTables } from "../types";
import { toStatNumber } from "../utils/number";
import { DEFAULT_BATTING_SCORING, DEFAULT_PITCHING_SCORING } from "./defaults";
import statLabels from "./stat-labels.json";

type ScoringSide = keyof ScoringTables;

interface StatLabelTarget {
  batting?: string;
  pitching?: string;
}

export interface ResolvedStat {
  side: ScoringSide;
  stat: string;
}

const STAT_IDS: Record<string, StatLabelTarget> = statLabels.statIds;
const STAT_LABELS: Record<string, StatLabelTarget> = statLabels.labels;

export function defaultScoringTables(): ScoringTables {
  return {
    batting: { ...DEFAULT_BATTING_SCORING },
    pitching: { ...DEFAULT_PITCHING_SCORING },
  };
}

/**
 * League point values layered over the defaults. Settings that cannot be
 * resolved to a canonical stat, or whose value is missing or zero, leave the
 * default in place.
 */
export function buildScoringTables(settings: readonly LeagueStatSetting[] | null | undefined): ScoringTables {
  if (!settings || settings.length === 0) {
    return defaultScoringTables();
  }

  const batting: ScoringTable = {};
  const pitching: ScoringTable = {};

  for (const setting of settings) {
    const resolved = resolveStatSetting(setting);
    const pointValue = toStatNumber(setting.pointValue);
    if (!resolved || pointValue === 0) {
      continue;
    }

    if (resolved.side === "batting") {
      batting[resolved.stat] = pointValue;
    } else {
      pitching[resolved.stat] = pointValue;
    }
  }

  return {
    batting: { ...DEFAULT_BATTING_SCORING, ...batting },
    pitching: { ...DEFAULT_PITCHING_SCORING, ...pitching },
  };
}

export function resolveStatSetting(setting: LeagueStatSetting): ResolvedStat | null {
  const target = lookupTarget(setting);
  if (!target) {
    return null;
  }

  if (setting.positionType === "B") {
    return target.batting ? { side: "batting", stat: target.batting } : null;
  }

  if (setting.positionType === "P") {
    return target.pitching ? { side: "pitching", stat: target.pitching } : null;
  }

  // Without a position type a label shared by both sides is ambiguous.
  if (target.batting && !target.pitching) {
    return { side: "batting", stat: target.batting };
  }

  if (target.pitching && !target.batting) {
    return { side: "pitching", stat: target.pitching };
  }

  return null;
}

export function normalizeStatLabel(label: string): string {
  return label.toLowerCase().replace(/[^a-z0-9]/g, "");
}

function lookupTarget(setting: LeagueStatSetting): StatLabelTarget | null {
  const statId = setting.statId?.trim();
  if (statId && Object.prototype.hasOwnProperty.call(STAT_IDS, statId)) {
    return STAT_IDS[statId];
  }

  const label = normalizeStatLabel(setting.statLabel);
  if (label && Object.prototype.hasOwnProperty.call(STAT_LABELS, label)) {
    return STAT_LABELS[label];
  }

  return null;
}
