import crypto from "node:crypto";
import { Logger } from "../logger";
import { Deposit, LedgerStore, LedgerTotals, Machine, Material } from "../models/store";
import { ReferenceCatalog } from "./catalog";
import { DepositError, DepositRejection, Result, err, ok } from "./errors";
import { CacheClaim, DepositGuard, depositFingerprint, validateWeight } from "./guard";
import { applyDeposit } from "./projector";
import { computeCentiPoints } from "./units";

export interface DepositRequest {
    userId: string;
    machineId: string;
    materialName: string;
    weightKg: number;
    notes?: string;
}

export interface DepositReceipt {
    deposit: Deposit;
    material: Material;
    machine: Machine;
    totals: LedgerTotals;
}

/** 96 random bits, e.g. TXN-3F9A0C6B12D4E5F60718293A. */
export function generateTransactionId(): string {
    return `TXN-${crypto.randomBytes(12).toString("hex").toUpperCase()}`;
}

export class DepositLedger {
    constructor(
        private readonly store: LedgerStore,
        private readonly catalog: ReferenceCatalog,
        private readonly guard: DepositGuard,
        private readonly logger: Logger,
        private readonly now: () => Date = () => new Date()
    ) {}

    async createDeposit(request: DepositRequest): Promise<Result<DepositReceipt, DepositError>> {
        const { userId } = request;

        const machineLookup = await this.catalog.lookupMachine(request.machineId);
        if (!machineLookup.ok) {
            return this.reject(userId, machineLookup.error);
        }
        const materialLookup = await this.catalog.lookupMaterial(request.materialName);
        if (!materialLookup.ok) {
            return this.reject(userId, materialLookup.error);
        }
        const machine = machineLookup.value;
        const material = materialLookup.value;
        const weight = validateWeight(request.weightKg, this.guard.policy);
        if (!weight.ok) {
            return this.reject(userId, weight.error);
        }
        const grams = weight.value;
        const at = this.now();

        const claims: CacheClaim[] = [];
        try {
            const fingerprint = await this.guard.claimFingerprint(
                depositFingerprint(userId, grams, material.name, machine.machineId)
            );
            if (!fingerprint.ok) {
                return this.reject(userId, fingerprint.error);
            }
            claims.push(fingerprint.value);

            const capacity = await this.guard.reserveMachineCapacity(machine.machineId, grams, at);
            if (!capacity.ok) {
                await this.releaseAll(claims);
                return this.reject(userId, capacity.error);
            }
            claims.push(capacity.value);

            const centiPoints = computeCentiPoints(grams, material.centiPointsPerKg);
            const { deposit, totals } = await this.store.withUserTransaction(userId, async tx => {
                const rejection = await this.guard.checkUserRate(tx, at);
                if (rejection) {
                    throw new DepositRejection(rejection);
                }
                const deposit = await tx.insertDeposit({
                    userId,
                    machineId: machine.machineId,
                    materialName: material.name,
                    grams,
                    centiPoints,
                    transactionId: generateTransactionId(),
                    createdAt: at,
                    notes: request.notes ?? ""
                });
                const aggregate = await applyDeposit(tx, deposit);
                return { deposit, totals: { centiPoints: aggregate.centiPoints, grams: aggregate.grams } };
            });

            this.logger.info(
                { userId, transactionId: deposit.transactionId, grams, centiPoints },
                "Deposit recorded"
            );
            return ok({ deposit, material, machine, totals });
        } catch (error) {
            await this.releaseAll(claims);
            if (error instanceof DepositRejection) {
                return this.reject(userId, error.error);
            }
            this.logger.error({ err: error, userId }, "Deposit transaction failed");
            throw error;
        }
    }

    private async releaseAll(claims: CacheClaim[]) {
        for (const claim of claims.splice(0).reverse()) {
            try {
                await claim.release();
            } catch (error) {
                // claims expire with their TTL
                this.logger.warn({ err: error }, "Could not release deposit guard claim");
            }
        }
    }

    private reject(userId: string, error: DepositError): { ok: false; error: DepositError } {
        this.logger.warn({ userId, kind: error.kind }, error.message);
        return err(error);
    }
}
