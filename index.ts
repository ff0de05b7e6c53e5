#!/usr/bin/env node
import type { AppConfig } from "./src/config.js";
import { ConfigError, resolveConfig } from "./src/config.js";
import { createAppContext } from "./src/context.js";
import { startHttpServer } from "./src/http-server.js";
import { createConsoleLogSink } from "./src/logger.js";

async function main(): Promise<void> {
  const log = createConsoleLogSink();
  let config: AppConfig;
  try {
    config = resolveConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      log.error(`webchat: ${err.message}`);
      process.exitCode = 1;
      return;
    }
    throw err;
  }

  const ctx = createAppContext(config, { log });
  const abort = new AbortController();
  const running = await startHttpServer(ctx, { abortSignal: abort.signal });

  for (const sig of ["SIGINT", "SIGTERM"] as const) {
    process.once(sig, () => {
      log.info(`webchat: ${sig} received, shutting down`);
      abort.abort();
      void running.close().then(() => process.exit(0));
    });
  }
}

main().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
