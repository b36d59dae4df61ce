import { loadLeagueConfig, resolveRuntimeEnv } from "../config";
import { FanGraphsClient } from "../integrations/fangraphs";
import { YahooFantasyClient } from "../integrations/yahoo";
import { LeagueCollector } from "../pipelines/collect";
import { SeasonStore } from "../store/season-store";
import { loadDotEnv } from "../utils/env";
import { parseArgs } from "./collect-args";

async function main(): Promise<void> {
  loadDotEnv();
  const options = parseArgs(process.argv.slice(2));
  const runtime = resolveRuntimeEnv(process.env);
  const config = await loadLeagueConfig(runtime.leagueConfigPath);

  const collector = new LeagueCollector({
    league: YahooFantasyClient.fromEnv(process.env, config.leagueIdOverrides),
    stats: new FanGraphsClient(),
    store: new SeasonStore(runtime.dataDir),
    config,
  });

  const testYear = options.year ?? config.currentSeason - 1;

  switch (options.command) {
    case "weekly":
      await collector.weeklyUpdate();
      return;
    case "setup":
      await collector.initialSetup();
      return;
    case "players":
      await collector.playerDataSetup();
      return;
    case "full":
      await collector.fullUpdate();
      return;
    case "check":
      await collector.checkAvailableSeasons(2015, config.currentSeason);
      return;
    case "test-stats": {
      const counts = await collector.testStatsProvider(testYear);
      // eslint-disable-next-line no-console
      console.log(`Batters: ${counts.batters} | Pitchers: ${counts.pitchers}`);
      return;
    }
    case "test-year":
      await collector.testSeasonPlayers(testYear);
      return;
  }
}

void main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  // eslint-disable-next-line no-console
  console.error(`collect failed: ${message}`);
  process.exit(1);
});
