import { LedgerTotals } from "../models/store";

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
    return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
    return { ok: false, error };
}

export type DepositError =
    | { kind: "InvalidReference"; field: "machine_id" | "material_name"; value: string; message: string }
    | { kind: "InvalidWeight"; weightKg: number; message: string }
    | { kind: "DuplicateSubmission"; retryAfterSeconds: number; message: string }
    | { kind: "DailyLimitExceeded"; limit: number; message: string }
    | { kind: "VelocityLimitExceeded"; limit: number; windowMinutes: number; message: string }
    | { kind: "MachineCapacityExceeded"; machineId: string; capacityKg: number; message: string };

export type DepositErrorKind = DepositError["kind"];

/** Carries a policy rejection out of a store transaction so the transaction rolls back. */
export class DepositRejection extends Error {
    constructor(readonly error: DepositError) {
        super(error.message);
        this.name = "DepositRejection";
    }
}

/** Stored aggregate disagrees with a sum over the ledger. A bug signal, never a user error. */
export class AggregateInconsistencyError extends Error {
    constructor(
        readonly userId: string,
        readonly stored: LedgerTotals,
        readonly ledger: LedgerTotals
    ) {
        super(
            `Aggregate for user ${userId} is ${stored.centiPoints}cp/${stored.grams}g ` +
            `but the ledger sums to ${ledger.centiPoints}cp/${ledger.grams}g`
        );
        this.name = "AggregateInconsistencyError";
    }
}
