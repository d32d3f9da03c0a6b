import { AppServices, buildServices } from "../container";
import { MemoryCache } from "../models/cache";
import { MemoryLedgerStore } from "../models/memoryStore";
import { Logger } from "../logger";
import { GuardPolicy } from "../services/guard";
import { seedCatalog } from "../services/seed";

export class TestClock {
  private current: Date;

  constructor(start: string) {
    this.current = new Date(start);
  }

  now(): Date {
    return new Date(this.current.getTime());
  }

  millis(): number {
    return this.current.getTime();
  }

  advance(ms: number) {
    this.current = new Date(this.current.getTime() + ms);
  }

  set(iso: string) {
    this.current = new Date(iso);
  }
}

export interface TestContext {
  clock: TestClock;
  store: MemoryLedgerStore;
  cache: MemoryCache;
  services: AppServices;
}

export async function createTestContext(
  options: { policy?: GuardPolicy; historyPageSize?: number; start?: string; logger?: Logger } = {}
): Promise<TestContext> {
  const clock = new TestClock(options.start ?? "2026-03-02T10:00:00.000Z");
  const store = new MemoryLedgerStore();
  const cache = new MemoryCache(() => clock.millis());
  const services = buildServices({
    store,
    cache,
    policy: options.policy,
    historyPageSize: options.historyPageSize,
    logger: options.logger,
    now: () => clock.now()
  });
  await seedCatalog(services.catalog);
  return { clock, store, cache, services };
}

export const MINUTE = 60_000;
export const DAY = 24 * 60 * MINUTE;
