import "dotenv/config";
import { createApp } from "./app";
import { AppConfig, loadConfig } from "./config";
import { buildServices } from "./container";
import { Logger, makeLogger } from "./logger";
import { KeyValueCache, MemoryCache } from "./models/cache";
import { MemoryLedgerStore } from "./models/memoryStore";
import { PgLedgerStore } from "./models/pgStore";
import { RedisCache, createRedisClient } from "./models/redisCache";
import { createPool, pgConnector } from "./models/sql";
import { LedgerStore } from "./models/store";
import { policyFromConfig } from "./services/guard";
import { seedCatalog } from "./services/seed";

async function main(config: AppConfig, logger: Logger) {
  let store: LedgerStore;
  let closeStore = async () => {};
  if (config.DATABASE_URL) {
    const db = pgConnector(createPool(config.DATABASE_URL));
    const pgStore = new PgLedgerStore(db);
    await pgStore.migrate();
    store = pgStore;
    closeStore = () => db.close();
  } else {
    logger.warn("DATABASE_URL not set, using the in-memory store");
    store = new MemoryLedgerStore();
  }

  let cache: KeyValueCache;
  let closeCache = async () => {};
  if (config.REDIS_URL) {
    const redis = createRedisClient(config.REDIS_URL);
    await redis.connect();
    cache = new RedisCache(redis);
    closeCache = async () => {
      await redis.quit();
    };
  } else {
    logger.warn("REDIS_URL not set, using the in-memory cache");
    cache = new MemoryCache();
  }

  const services = buildServices({
    store,
    cache,
    policy: policyFromConfig(config),
    historyPageSize: config.HISTORY_PAGE_SIZE,
    logger
  });
  const counts = await store.catalogCounts();
  if (counts.materials === 0 && counts.machines === 0) {
    const seeded = await seedCatalog(services.catalog);
    logger.info(seeded, "Empty catalog seeded");
  }

  services.reconciler.start(config.RECONCILE_INTERVAL_MINUTES * 60_000);

  const server = createApp(services).listen(config.PORT, () => {
    logger.info({ port: config.PORT }, "RVM deposit ledger listening");
  });

  const shutdown = (signal: string) => {
    logger.info({ signal }, "Shutting down");
    services.reconciler.stop();
    server.close(() => {
      Promise.all([closeStore(), closeCache()])
        .then(() => process.exit(0))
        .catch(error => {
          logger.error({ err: error }, "Error while closing connections");
          process.exit(1);
        });
    });
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

// An invalid environment throws ConfigError here, before anything starts
const config = loadConfig();
const logger = makeLogger(config);

main(config, logger).catch(error => {
  logger.fatal({ err: error }, "Failed to start");
  process.exit(1);
});
