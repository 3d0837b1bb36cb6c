/**
 * One day-use pass availability run.
 *
 * Reads configuration from the environment (and .env), checks every
 * configured park for the date window, sends Telegram alerts, then exits.
 * Meant to be invoked by an external scheduler.
 *
 * Usage: TELEGRAM_BOT_TOKEN=... TELEGRAM_CHAT_ID=... npm run check
 */
import "dotenv/config";
import { createMonitorRuntime, runMonitorOnce } from "../services/monitor-runtime.js";
import { loadMonitorConfig, MonitorConfigError } from "../utils/monitor-config.js";

const main = async () => {
  const runtime = createMonitorRuntime(loadMonitorConfig(process.env));
  const result = await runMonitorOnce(runtime);

  if (result) {
    console.log(`\n✓ ${result.availableCount}/${result.units.length} check(s) found availability`);
  }
};

main().catch((error) => {
  if (error instanceof MonitorConfigError) {
    console.error(error.message);
    process.exit(1);
  }

  console.error("Fatal error in check-availability:");
  console.error(error);
  process.exit(0);
});
