import { createApp } from "./app.js";
import { loadConfig } from "./config.js";
import { getLogger } from "./logger.js";
import { createFixGenerator } from "./services/aiService.js";
import { ensureStorageDir } from "./services/fileStorage.js";
import { SessionStore } from "./sessionStore.js";
import { SessionSweeper, createLoggingDispatcher } from "./sessionSweeper.js";
import { UsageLimiter } from "./usageLimiter.js";
import { UserTaskQueue } from "./userTaskQueue.js";

const log = getLogger("server");

async function main(): Promise<void> {
  const config = loadConfig();
  await ensureStorageDir(config.storageDir);

  const sessions = new SessionStore({
    warningMs: config.sessionWarningMs,
    idleMs: config.idleTimeoutMs,
    extendedMs: config.sessionExpireMs
  });
  const usage = new UsageLimiter({
    limit: config.usageLimit,
    warningThreshold: config.usageWarningThreshold,
    windowMs: config.usageWindowMs
  });

  const fixGenerator = config.fixApiKey
    ? createFixGenerator({
        provider: config.fixProvider,
        apiKey: config.fixApiKey,
        model: config.fixModel,
        maxContentChars: config.maxContentChars,
        timeoutMs: config.aiRequestTimeoutMs
      })
    : undefined;
  if (!fixGenerator) {
    log.warn("No API key for fix generation; /fixes/generate is disabled", { provider: config.fixProvider });
  }

  const queue = new UserTaskQueue();
  const app = createApp({
    sessions,
    usage,
    queue,
    fixGenerator,
    storageDir: config.storageDir,
    maxFileSizeBytes: config.maxFileSizeBytes
  });

  const sweeper = new SessionSweeper(sessions, usage, createLoggingDispatcher(), config.sweepIntervalMs, queue);
  sweeper.start();

  const server = app.listen(config.port, () => {
    log.info(`Backend listening on http://localhost:${config.port}`, { storageDir: config.storageDir });
  });

  const shutdown = async (signal: string): Promise<void> => {
    log.info("Shutting down", { signal });
    await sweeper.stop();
    await new Promise<void>((resolve) => server.close(() => resolve()));
    await sessions.dispose();
    process.exit(0);
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      void shutdown(signal).catch((error: unknown) => {
        log.error("Shutdown failed", { error });
        process.exit(1);
      });
    });
  }
}

main().catch((error: unknown) => {
  log.error("Failed to start server", { error });
  process.exit(1);
});
