import crypto from "node:crypto";
import { AppConfig } from "../config";
import { KeyValueCache } from "../models/cache";
import { UserTransaction } from "../models/store";
import { DepositError, Result, err, ok } from "./errors";
import { gramsToKg, kgToGrams, startOfUtcDay, utcDayKey } from "./units";

type Rejection<K extends DepositError["kind"]> = Extract<DepositError, { kind: K }>;

export interface GuardPolicy {
    maxDepositGrams: number;
    dailyDepositLimit: number;
    velocityLimit: number;
    velocityWindowMinutes: number;
    duplicateWindowSeconds: number;
    machineDailyCapacityGrams: number;
}

export const DEFAULT_POLICY: GuardPolicy = {
    maxDepositGrams: 50_000,
    dailyDepositLimit: 50,
    velocityLimit: 10,
    velocityWindowMinutes: 5,
    duplicateWindowSeconds: 60,
    machineDailyCapacityGrams: 500_000
};

// Outlives the UTC day it counts; the date in the key does the resetting.
const MACHINE_COUNTER_TTL_SECONDS = 2 * 24 * 60 * 60;

export function policyFromConfig(config: AppConfig): GuardPolicy {
    return {
        maxDepositGrams: Math.round(config.MAX_DEPOSIT_WEIGHT_KG * 1000),
        dailyDepositLimit: config.DAILY_DEPOSIT_LIMIT,
        velocityLimit: config.VELOCITY_LIMIT,
        velocityWindowMinutes: config.VELOCITY_WINDOW_MINUTES,
        duplicateWindowSeconds: config.DUPLICATE_WINDOW_SECONDS,
        machineDailyCapacityGrams: Math.round(config.MACHINE_DAILY_CAPACITY_KG * 1000)
    };
}

export function validateWeight(weightKg: number, policy: GuardPolicy): Result<number, Rejection<"InvalidWeight">> {
    const grams = kgToGrams(weightKg);
    if (grams === undefined) {
        return err({ kind: "InvalidWeight", weightKg, message: "Weight must be a number with at most 3 decimal places" });
    }
    if (grams <= 0) {
        return err({ kind: "InvalidWeight", weightKg, message: "Weight must be greater than 0" });
    }
    if (grams > policy.maxDepositGrams) {
        return err({
            kind: "InvalidWeight",
            weightKg,
            message: `Weight exceeds maximum allowed per deposit (${gramsToKg(policy.maxDepositGrams)} kg)`
        });
    }
    return ok(grams);
}

/** Same user, weight, material and machine give the same fingerprint. */
export function depositFingerprint(userId: string, grams: number, materialName: string, machineId: string): string {
    return crypto
        .createHash("sha256")
        .update([userId, grams, materialName.toLowerCase(), machineId.toLowerCase()].join("\u0000"))
        .digest("hex");
}

/** A hold on cache state that must be given back if the deposit is not accepted. */
export interface CacheClaim {
    release(): Promise<void>;
}

export class DepositGuard {
    constructor(
        private readonly cache: KeyValueCache,
        readonly policy: GuardPolicy
    ) {}

    async claimFingerprint(fingerprint: string): Promise<Result<CacheClaim, Rejection<"DuplicateSubmission">>> {
        const key = `deposit:fingerprint:${fingerprint}`;
        const claimed = await this.cache.setIfAbsent(key, "1", this.policy.duplicateWindowSeconds);
        if (!claimed) {
            return err({
                kind: "DuplicateSubmission",
                retryAfterSeconds: this.policy.duplicateWindowSeconds,
                message: "Duplicate deposit detected"
            });
        }
        return ok({ release: () => this.cache.delete(key) });
    }

    async reserveMachineCapacity(
        machineId: string,
        grams: number,
        at: Date
    ): Promise<Result<CacheClaim, Rejection<"MachineCapacityExceeded">>> {
        const key = `machine:grams:${machineId.toLowerCase()}:${utcDayKey(at)}`;
        const total = await this.cache.incrementWithin(
            key,
            grams,
            this.policy.machineDailyCapacityGrams,
            MACHINE_COUNTER_TTL_SECONDS
        );
        if (total === null) {
            return err({
                kind: "MachineCapacityExceeded",
                machineId,
                capacityKg: gramsToKg(this.policy.machineDailyCapacityGrams),
                message: "Machine capacity exceeded for today"
            });
        }
        const release = async () => {
            await this.cache.incrementBy(key, -grams, MACHINE_COUNTER_TTL_SECONDS);
        };
        return ok({ release });
    }

    /** Daily and velocity counts come from the ledger, read under the user's aggregate lock. */
    async checkUserRate(tx: Pick<UserTransaction, "countDepositsSince">, at: Date): Promise<DepositError | undefined> {
        const today = await tx.countDepositsSince(startOfUtcDay(at));
        if (today >= this.policy.dailyDepositLimit) {
            return { kind: "DailyLimitExceeded", limit: this.policy.dailyDepositLimit, message: "Daily deposit limit exceeded" };
        }
        const windowStart = new Date(at.getTime() - this.policy.velocityWindowMinutes * 60_000);
        const recent = await tx.countDepositsSince(windowStart);
        if (recent > this.policy.velocityLimit) {
            return {
                kind: "VelocityLimitExceeded",
                limit: this.policy.velocityLimit,
                windowMinutes: this.policy.velocityWindowMinutes,
                message: "Too many deposits in short time period"
            };
        }
        return undefined;
    }
}
