import { env } from "./config/env.js";
import { logger as rootLogger } from "./config/logger.js";
import { authStore } from "./services/authStore.js";
import { resetTokenStore } from "./services/resetTokenStore.js";
import { sessionStore } from "./services/sessionStore.js";

const logger = rootLogger.child({ component: "maintenance-worker" });

async function runMaintenance(): Promise<{ deletedSessions: number; deletedResetTokens: number }> {
  const [deletedSessions, deletedResetTokens] = await Promise.all([sessionStore.sweepExpired(), resetTokenStore.sweepExpired()]);
  return { deletedSessions, deletedResetTokens };
}

function tick() {
  void runMaintenance()
    .then((result) => {
      logger.debug(result, "Maintenance heartbeat");
    })
    .catch((error: unknown) => {
      logger.warn({ err: error }, "Maintenance heartbeat failure");
    });
}

logger.info({ intervalSeconds: env.MAINTENANCE_INTERVAL_SEC }, "Maintenance worker booted");
tick();
const timer = setInterval(tick, env.MAINTENANCE_INTERVAL_SEC * 1000);

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    clearInterval(timer);
    logger.info({ signal }, "Maintenance worker stopping");
    void authStore.close().catch((error: unknown) => {
      logger.error({ err: error }, "Failed to close storage pool");
      process.exitCode = 1;
    });
  });
}
