import { LedgerStore, Machine, Material } from "../models/store";
import { DepositError, Result, err, ok } from "./errors";
import { MAX_POINTS_PER_KG, rateToCentiPoints } from "./units";

export type InvalidReference = Extract<DepositError, { kind: "InvalidReference" }>;

export interface MaterialInput {
    name: string;
    pointsPerKg: number;
    description: string;
    active: boolean;
}

export interface MachineInput {
    machineId: string;
    location: string;
    latitude: number | null;
    longitude: number | null;
    active: boolean;
}

export class InvalidRateError extends Error {
    constructor(readonly pointsPerKg: number) {
        super(`points_per_kg must be a positive amount up to ${MAX_POINTS_PER_KG} with at most 2 decimal places, got ${pointsPerKg}`);
        this.name = "InvalidRateError";
    }
}

/** Lookups of active materials and machines, case-insensitive on the key. */
export class ReferenceCatalog {
    constructor(private readonly store: LedgerStore) {}

    async lookupMaterial(name: string): Promise<Result<Material, InvalidReference>> {
        const material = await this.store.findActiveMaterial(name);
        if (!material) {
            return err({
                kind: "InvalidReference",
                field: "material_name",
                value: name,
                message: "Invalid or inactive material type"
            });
        }
        return ok(material);
    }

    async lookupMachine(machineId: string): Promise<Result<Machine, InvalidReference>> {
        const machine = await this.store.findActiveMachine(machineId);
        if (!machine) {
            return err({
                kind: "InvalidReference",
                field: "machine_id",
                value: machineId,
                message: "Invalid or inactive machine ID"
            });
        }
        return ok(machine);
    }

    listMaterials(): Promise<Material[]> {
        return this.store.listActiveMaterials();
    }

    listMachines(): Promise<Machine[]> {
        return this.store.listActiveMachines();
    }

    /** Rate changes apply to future deposits only; ledger entries keep the points they were written with. */
    async upsertMaterial(input: MaterialInput): Promise<Material> {
        const centiPointsPerKg = rateToCentiPoints(input.pointsPerKg);
        if (centiPointsPerKg === undefined || centiPointsPerKg <= 0 || input.pointsPerKg > MAX_POINTS_PER_KG) {
            throw new InvalidRateError(input.pointsPerKg);
        }
        return this.store.upsertMaterial({
            name: input.name.trim(),
            centiPointsPerKg,
            description: input.description,
            active: input.active
        });
    }

    upsertMachine(input: MachineInput): Promise<Machine> {
        return this.store.upsertMachine({ ...input, machineId: input.machineId.trim() });
    }
}
