#!/usr/bin/env node

import { createApp, main } from "./index.js";
import { loadSettings } from "./config/load.js";
import { setLogLevel } from "./utils/logger.js";

const VERSION = "0.1.0";

const cmd = process.argv[2];

/** Run one refresh cycle and print the resulting state as JSON. */
async function runSnapshot(): Promise<void> {
  const settings = loadSettings();
  setLogLevel(settings.logLevel);
  const tailArg = process.argv[3];

  const app = createApp(settings);
  if (tailArg !== undefined) {
    app.pipeline.setTail(tailArg.toLowerCase() === "all" ? null : Number(tailArg));
  }

  const state = await app.driver.trigger();
  if (state.error) {
    console.error(`Refresh failed (${state.error.kind}): ${state.error.message}`);
    process.exitCode = 1;
    return;
  }
  console.log(JSON.stringify(state.data, null, 2));
}

async function run(): Promise<void> {
  switch (cmd) {
    case "run":
    case undefined:
      await main();
      break;

    case "snapshot":
      await runSnapshot();
      break;

    case "version":
      console.log(`exchange-dashboard v${VERSION}`);
      break;

    case "help":
    default:
      console.log(`
Exchange Dashboard: read-only web view of a paper-trading exchange

Usage:
  npx tsx src/cli.ts run                 Start the dashboard (default)
  npx tsx src/cli.ts snapshot [tail|all] Run one refresh and print the state as JSON
  npx tsx src/cli.ts version             Print version
  npx tsx src/cli.ts help                Show this help

Environment Variables (a .env file in the working directory is read first):
  API_URL              Exchange base URL (default http://localhost:8000)
  API_KEY              Value sent as x-api-key
  QUOTE_ASSET          Valuation currency (default USDT)
  REFRESH_SECONDS      Refresh interval (default 60)
  REQUEST_TIMEOUT_MS   Per-request timeout (default 3000)
  FRESH_WINDOW_S       Order freshness window (default 300)
  N_VISUAL_DEGRADATIONS  Order row fade levels (default 12)
  SLIDER_MIN/MAX/STEP/DEFAULT  Orders tail slider (default 10/1000/10/100)
  APP_TITLE, LOGO_FILE Branding
  UI_URL               Base URL for order detail links
  LOCAL_TZ             Time zone for timestamps (default UTC)
  DASHBOARD_HOST/PORT  Bind address (default 127.0.0.1:8501)
  ADVANCED_DETAILS     Also fetch /overview/assets and /balance/list (default 1)
  LOG_LEVEL            debug | info | warn | error
`);
      break;
  }
}

run().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
