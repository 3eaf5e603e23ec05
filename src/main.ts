import { serve } from "@hono/node-server";
import { noteParserFor } from "./ingest/notes";
import { RefreshOrchestrator, openConfiguredStore, sleepUntilAborted } from "./ingest/orchestrator";
import { createApp } from "./server/app";
import { setActiveStore } from "./stores/activeStore";
import { appConfigStore, getAppConfig, getLibraries } from "./stores/appConfigStore";
import { loadConfig } from "./utils/configLoader";
import { getErrorMessage } from "./utils/errors";
import { getLogger, setLogLevel, Subsystem } from "./utils/logger";

const log = getLogger(Subsystem.Server);

async function main(): Promise<void> {
  const config = await loadConfig();
  setLogLevel(config.server.log_level);
  appConfigStore.getState().setConfig(config);

  const { server } = config;
  setActiveStore(await openConfiguredStore(server));

  const orchestrator = new RefreshOrchestrator({ getConfig: getAppConfig, getLibraries });
  const app = createApp({ getConfig: getAppConfig, getLibraries, orchestrator, parserFor: (lib) => noteParserFor(lib) });

  const httpServer = serve({ fetch: app.fetch, hostname: server.host, port: server.port }, (info) => {
    log.info({ host: info.address, port: info.port }, "Server listening");
  });

  const shutdown = new AbortController();
  const stop = (signal: NodeJS.Signals) => {
    log.info({ signal }, "Shutting down");
    shutdown.abort();
    httpServer.close();
  };
  process.once("SIGINT", stop);
  process.once("SIGTERM", stop);

  if (server.log_level !== "debug" && server.delay > 0) {
    log.info({ seconds: server.delay }, "Delaying first refresh");
    await sleepUntilAborted(server.delay * 1000, shutdown.signal);
  }
  if (!shutdown.signal.aborted) await orchestrator.run(shutdown.signal);
}

main().catch((err: unknown) => {
  log.fatal({ reason: getErrorMessage(err) }, "Startup failed");
  process.exit(1);
});
