import { loadConfig } from "./config.js";
import { makeProviders } from "./providers/factory.js";
import { makeLogger } from "./server/logger.js";
import { startHttpServer } from "./server/http.js";

function main(): void {
  const config = loadConfig(process.env);
  const logger = makeLogger(config.logLevel);
  const providers = makeProviders(config, logger);

  const relay = startHttpServer(config.port, logger, {
    translator: providers.translator,
    tts: providers.tts,
    upstream: {
      apiKey: config.upstreamApiKey,
      realtimeUrl: config.upstreamRealtimeUrl,
      defaultModel: config.defaultRecognitionModel,
    },
    relayMaxPendingMessages: config.relayMaxPendingMessages,
  });

  const shutdown = (signal: NodeJS.Signals): void => {
    logger.info("shutdown signal received", { signal });
    relay.shutdown().then(
      () => process.exit(),
      (error: unknown) => {
        logger.error("failed to close http server", {
          error: error instanceof Error ? error.message : String(error),
        });
        process.exitCode = 1;
        process.exit();
      },
    );
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main();
