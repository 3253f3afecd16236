import dotenv from 'dotenv';
import type { Server } from 'node:http';
import type Redis from 'ioredis';
import { loadConfig, type AppConfig } from './lib/config';
import { createLogger, type Logger } from './lib/logger';
import { createRedisClient } from './lib/redis';
import { MemoryKeyValueStore, RedisKeyValueStore, type KeyValueStore } from './lib/kv-store';
import { OpenAIEntityExtractor } from './lib/extractor';
import { ExtractionCache, extractionResultSchema } from './extraction-cache';
import { Ingestion } from './ingestion';
import { DocxDocumentRenderer } from './rendering';
import { EmailNotifier } from './notifier';
import { DraftStore, draftSchema } from './persistence-service';
import { PermitPipeline } from './pipeline';
import { FolderMonitor } from './folder-monitor';
import { createApp } from './upload-service';
import type { Draft, ExtractionResult } from './types/permit';

interface Stores {
  drafts: KeyValueStore<Draft>;
  extractions: KeyValueStore<ExtractionResult>;
  redis: Redis | null;
}

function createStores(config: AppConfig, logger: Logger): Stores {
  if (config.storage.backend === 'memory') {
    logger.warn('Using in-memory storage - drafts are lost on restart');
    return {
      drafts: new MemoryKeyValueStore<Draft>(),
      extractions: new MemoryKeyValueStore<ExtractionResult>(),
      redis: null,
    };
  }

  const redis = createRedisClient(config.storage.redisUrl, logger);
  return {
    drafts: new RedisKeyValueStore(redis, 'draft', draftSchema),
    extractions: new RedisKeyValueStore(redis, 'extraction', extractionResultSchema),
    redis,
  };
}

function buildPipeline(config: AppConfig, logger: Logger, stores: Stores): PermitPipeline {
  if (!config.extraction.apiKey) {
    logger.warn('OPENAI_API_KEY is not set - every extraction will fail');
  }

  return new PermitPipeline({
    ingestion: new Ingestion(config.storage.uploadDir),
    extractor: new OpenAIEntityExtractor({
      apiKey: config.extraction.apiKey,
      baseUrl: config.extraction.baseUrl,
      textModel: config.extraction.textModel,
      visionModel: config.extraction.visionModel,
    }),
    cache: new ExtractionCache(stores.extractions, logger.child({ component: 'extraction-cache' })),
    renderer: new DocxDocumentRenderer({
      outputDir: config.storage.outputDir,
      paymentAccount: config.fees.paymentAccount,
      paymentDueDays: config.fees.paymentDueDays,
    }),
    drafts: new DraftStore(stores.drafts),
    notifier: new EmailNotifier(
      config.mail,
      { paymentAccount: config.fees.paymentAccount, paymentDueDays: config.fees.paymentDueDays },
      logger
    ),
    logger,
    settings: {
      ratePerSqmDay: config.fees.ratePerSqmDay,
      fallbackDurationDays: config.fees.fallbackDurationDays,
      extractionTimeoutMs: config.extraction.timeoutMs,
    },
  });
}

async function main(): Promise<void> {
  dotenv.config();
  const config = loadConfig();
  const logger = createLogger(config.logging.level);

  const stores = createStores(config, logger);
  const pipeline = buildPipeline(config, logger, stores);
  const app = createApp({ pipeline, logger, corsOrigins: config.server.corsOrigins });

  const server: Server = app.listen(config.server.port, () => {
    logger.info({ port: config.server.port }, 'Permit intake service running');
  });

  // Files already in the intake folder are scanned in the background
  const monitor = config.watch.enabled ? new FolderMonitor(config.watch.folder, pipeline, logger) : null;
  if (monitor) {
    await monitor.start();
  }

  const shutdown = (signal: string) => {
    logger.info({ signal }, 'Shutting down');
    monitor?.stop();
    server.close((err) => {
      if (err) {
        logger.error({ err }, 'HTTP server did not close cleanly');
      }
      const closed = stores.redis ? stores.redis.quit().then(() => undefined) : Promise.resolve();
      void closed
        .catch((quitErr: unknown) => logger.error({ err: quitErr }, 'Redis did not close cleanly'))
        .finally(() => process.exit(err ? 1 : 0));
    });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

if (require.main === module) {
  main().catch((err: unknown) => {
    console.error('Failed to start permit intake service:', err);
    process.exit(1);
  });
}
