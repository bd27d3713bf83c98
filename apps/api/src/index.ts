import "dotenv/config";
import { loadConfig, toBool } from "./config";
import { DailyResetScheduler } from "./scheduler";
import { buildServer } from "./server";

async function main() {
  const config = loadConfig();
  const app = buildServer();
  if (toBool(config.API_AUTH_BYPASS)) {
    app.log.warn("API_AUTH_BYPASS is on, every caller is treated as admin");
  }

  const scheduler = new DailyResetScheduler({
    authority: app.quotas,
    hourUtc: config.RESET_HOUR_UTC,
    logger: app.log,
  });

  const shutdown = async (signal: string) => {
    app.log.info({ signal }, "shutting down");
    scheduler.stop();
    await app.close();
    process.exit(0);
  };
  process.once("SIGINT", () => void shutdown("SIGINT"));
  process.once("SIGTERM", () => void shutdown("SIGTERM"));

  await app.listen({ port: config.PORT, host: config.HOST });
  scheduler.start();
  app.log.info({ nextReset: scheduler.nextRunAt?.toISOString() }, "daily quota reset scheduled");
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
