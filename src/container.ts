import { loadConfig } from "./config";
import { Logger, makeLogger } from "./logger";
import { KeyValueCache } from "./models/cache";
import { LedgerStore } from "./models/store";
import { ReferenceCatalog } from "./services/catalog";
import { DEFAULT_POLICY, DepositGuard, GuardPolicy } from "./services/guard";
import { DepositLedger } from "./services/ledger";
import { AggregateProjector } from "./services/projector";
import { Reconciler } from "./services/reconciler";
import { ReportingService } from "./services/reporting";

export interface ServiceOptions {
    store: LedgerStore;
    cache: KeyValueCache;
    policy?: GuardPolicy;
    historyPageSize?: number;
    logger?: Logger;
    now?: () => Date;
}

export interface AppServices {
    store: LedgerStore;
    cache: KeyValueCache;
    catalog: ReferenceCatalog;
    guard: DepositGuard;
    ledger: DepositLedger;
    projector: AggregateProjector;
    reporting: ReportingService;
    reconciler: Reconciler;
    logger: Logger;
}

export function buildServices(options: ServiceOptions): AppServices {
    const logger = options.logger ?? makeLogger(loadConfig());
    const now = options.now ?? (() => new Date());
    const { store, cache } = options;

    const catalog = new ReferenceCatalog(store);
    const guard = new DepositGuard(cache, options.policy ?? DEFAULT_POLICY);
    const projector = new AggregateProjector(store, logger.child({ module: "projector" }));
    const ledger = new DepositLedger(store, catalog, guard, logger.child({ module: "ledger" }), now);
    const reporting = new ReportingService(store, projector, options.historyPageSize ?? 20, now);
    const reconciler = new Reconciler(store, projector, logger.child({ module: "reconciler" }));

    return { store, cache, catalog, guard, ledger, projector, reporting, reconciler, logger };
}
