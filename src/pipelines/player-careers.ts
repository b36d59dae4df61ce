import { normalizePlayerName } from "../identity/names";
import type { PlayerCareerRecord, PlayerSeasonRecord } from "../types";
import { roundToTenth } from "../utils/number";

export interface PlayerSeasonFile {
  year: number;
  players: readonly PlayerSeasonRecord[];
}

/** Careers keyed by normalized name, seasons in the order the files are given. */
export function buildPlayerCareers(seasons: readonly PlayerSeasonFile[]): Record<string, PlayerCareerRecord> {
  const careers: Record<string, PlayerCareerRecord> = {};

  for (const season of seasons) {
    for (const player of season.players) {
      if (!player.name) {
        continue;
      }

      const key = normalizePlayerName(player.name);
      const career = careers[key] ?? { name: player.name, seasons: [], careerFantasyPoints: 0 };
      careers[key] = career;

      career.seasons.push({
        year: season.year,
        teamName: player.teamName,
        manager: player.manager,
        fantasyPoints: player.fantasyPoints,
        role: player.role,
        stats: player.stats,
      });
      career.careerFantasyPoints = roundToTenth(career.careerFantasyPoints + player.fantasyPoints);
    }
  }

  return careers;
}
