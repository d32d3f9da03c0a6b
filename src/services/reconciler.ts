import { Logger } from "../logger";
import { LedgerStore, LedgerTotals } from "../models/store";
import { AggregateInconsistencyError } from "./errors";
import { AggregateProjector } from "./projector";

export interface RepairedUser {
    userId: string;
    before: LedgerTotals;
    after: LedgerTotals;
}

export interface ReconciliationReport {
    checked: number;
    repaired: RepairedUser[];
    failed: string[];
}

/**
 * Audits every stored aggregate against the ledger and rebuilds the ones that drifted.
 * Safe to run at any time and as often as needed.
 */
export class Reconciler {
    private timer: NodeJS.Timeout | undefined;
    private running: Promise<ReconciliationReport> | undefined;

    constructor(
        private readonly store: LedgerStore,
        private readonly projector: AggregateProjector,
        private readonly logger: Logger
    ) {}

    async run(): Promise<ReconciliationReport> {
        // one pass at a time per process; overlapping callers share it
        if (!this.running) {
            this.running = this.pass().finally(() => {
                this.running = undefined;
            });
        }
        return this.running;
    }

    private async pass(): Promise<ReconciliationReport> {
        const report: ReconciliationReport = { checked: 0, repaired: [], failed: [] };
        for (const userId of await this.store.listAggregateUserIds()) {
            report.checked += 1;
            try {
                const repaired = await this.reconcileUser(userId);
                if (repaired) {
                    report.repaired.push(repaired);
                }
            } catch (error) {
                this.logger.error({ err: error, userId }, "Aggregate audit failed");
                report.failed.push(userId);
            }
        }
        this.logger.info(
            { checked: report.checked, repaired: report.repaired.length, failed: report.failed.length },
            "Reconciliation finished"
        );
        return report;
    }

    private async reconcileUser(userId: string): Promise<RepairedUser | undefined> {
        try {
            await this.projector.assertConsistent(userId);
            return undefined;
        } catch (error) {
            if (!(error instanceof AggregateInconsistencyError)) {
                throw error;
            }
            this.logger.error({ err: error, userId }, "Aggregate drifted from ledger");
            const after = await this.projector.rebuildUserAggregate(userId);
            return { userId, before: error.stored, after };
        }
    }

    start(intervalMs: number) {
        if (this.timer || intervalMs <= 0) {
            return;
        }
        this.timer = setInterval(() => {
            this.run().catch(error => this.logger.error({ err: error }, "Reconciliation pass crashed"));
        }, intervalMs);
        this.timer.unref();
    }

    stop() {
        if (this.timer) {
            clearInterval(this.timer);
            this.timer = undefined;
        }
    }
}
