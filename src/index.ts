import { createApp } from "./app";
import { resolveRuntimeEnv } from "./config";
import { SeasonStore } from "./store/season-store";
import { loadDotEnv } from "./utils/env";

loadDotEnv();

const runtime = resolveRuntimeEnv(process.env);
const app = createApp(new SeasonStore(runtime.dataDir));

app.listen(runtime.port, () => {
  // eslint-disable-next-line no-console
  console.log(`League ledger API listening on http://localhost:${runtime.port}`);
});
