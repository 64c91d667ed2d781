import dotenv from 'dotenv';
import { ReviewAnalyzer } from './analysis/analyzer';
import { CapabilityHandle, CapabilityProviders } from './analysis/capabilities';
import { createApp } from './app';
import { AppConfig, loadConfig } from './config';
import { GroqRatingEnsemble } from './groq/groqClient';
import { HuggingFaceZeroShotClassifier } from './huggingface/zeroShotClassifier';
import { InMemoryProductStore } from './storage/productStore';
import { logger } from './utils/logger';

dotenv.config();

export function buildProviders(config: AppConfig): CapabilityProviders {
  if (!config.enableMl) return {};
  return {
    ratingEnsemble: new GroqRatingEnsemble({
      apiKey: config.groqApiKey,
      model: config.groqModel,
      requestTimeoutMs: config.mlTimeoutMs,
    }),
    zeroShotClassifier: new HuggingFaceZeroShotClassifier({
      apiToken: config.hfApiToken,
      model: config.zeroShotModel,
      requestTimeoutMs: config.mlTimeoutMs,
    }),
  };
}

async function main() {
  const config = loadConfig();
  logger.setLevel(config.logLevel);

  const capabilities = new CapabilityHandle(buildProviders(config), {
    // First requests may wake a cold model.
    loadTimeoutMs: config.mlTimeoutMs * 3,
  });
  const status = await capabilities.init();
  logger.info(
    `Capabilities: rating ensemble ${status.ratingEnsemble ? 'on' : 'off'}, ` +
      `zero-shot classifier ${status.zeroShotClassifier ? 'on' : 'off'}`,
  );

  const analyzer = new ReviewAnalyzer(capabilities, {
    timeoutMs: config.mlTimeoutMs,
    concurrency: config.analysisConcurrency,
    threshold: config.complaintThreshold,
  });

  const app = createApp({
    analyzer,
    capabilities,
    store: new InMemoryProductStore(),
    defaultThreshold: config.complaintThreshold,
  });

  const server = app.listen(config.port, () => {
    logger.info(`Backend listening on port ${config.port}`);
  });

  const shutdown = (signal: string) => {
    logger.info(`${signal} received, shutting down`);
    server.close(() => {
      capabilities
        .teardown()
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          logger.error('Capability teardown failed', err);
          process.exit(1);
        });
    });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

if (require.main === module) {
  main().catch((err: unknown) => {
    logger.error('Failed to start backend', err);
    process.exit(1);
  });
}
