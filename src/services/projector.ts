import { Logger } from "../logger";
import { Deposit, LedgerStore, LedgerTotals, UserAggregate, UserTransaction, ZERO_TOTALS } from "../models/store";
import { AggregateInconsistencyError } from "./errors";
import { addTotals, sameTotals } from "./units";

export interface AuditResult {
    userId: string;
    stored: LedgerTotals;
    ledger: LedgerTotals;
    consistent: boolean;
}

/**
 * Incremental path. Must run inside the transaction that inserted `deposit`,
 * so the entry and the new totals commit together.
 */
export function applyDeposit(tx: UserTransaction, deposit: Pick<Deposit, "centiPoints" | "grams">): Promise<UserAggregate> {
    return tx.writeAggregate(addTotals(tx.aggregate, deposit));
}

function totalsOf(aggregate: LedgerTotals): LedgerTotals {
    return { centiPoints: aggregate.centiPoints, grams: aggregate.grams };
}

export class AggregateProjector {
    constructor(private readonly store: LedgerStore, private readonly logger: Logger) {}

    async getUserTotals(userId: string): Promise<LedgerTotals> {
        const aggregate = await this.store.getAggregate(userId);
        return aggregate ? totalsOf(aggregate) : { ...ZERO_TOTALS };
    }

    /** True when the user has neither an aggregate row nor any ledger entry. */
    private async isUnknown(userId: string): Promise<boolean> {
        if (await this.store.getAggregate(userId)) {
            return false;
        }
        const ledger = await this.store.totalsSince(userId, new Date(0));
        return ledger.count === 0;
    }

    /** Recomputes the user's totals from the ledger alone and overwrites the stored row. */
    async rebuildUserAggregate(userId: string): Promise<LedgerTotals> {
        // no row is created for an id that has never deposited
        if (await this.isUnknown(userId)) {
            return { ...ZERO_TOTALS };
        }
        const rebuilt = await this.store.withUserTransaction(userId, async tx => {
            const totals = await tx.sumDeposits();
            return tx.writeAggregate(totals);
        });
        this.logger.info({ userId, ...totalsOf(rebuilt) }, "Rebuilt user aggregate");
        return totalsOf(rebuilt);
    }

    async auditUser(userId: string): Promise<AuditResult> {
        if (await this.isUnknown(userId)) {
            return { userId, stored: { ...ZERO_TOTALS }, ledger: { ...ZERO_TOTALS }, consistent: true };
        }
        return this.store.withUserTransaction(userId, async tx => {
            const ledger = await tx.sumDeposits();
            const stored = totalsOf(tx.aggregate);
            return { userId, stored, ledger, consistent: sameTotals(stored, ledger) };
        });
    }

    async assertConsistent(userId: string): Promise<void> {
        const audit = await this.auditUser(userId);
        if (!audit.consistent) {
            throw new AggregateInconsistencyError(userId, audit.stored, audit.ledger);
        }
    }
}
