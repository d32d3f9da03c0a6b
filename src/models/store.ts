// Domain records and the persistence contract shared by the in-memory and PostgreSQL stores.
// Weights are integer grams and points are integer hundredths of a point, so every sum is exact.

export interface Material {
    name: string;
    centiPointsPerKg: number; // 1.00 pts/kg == 100
    description: string;
    active: boolean;
}

export interface Machine {
    machineId: string;
    location: string;
    latitude: number | null;
    longitude: number | null;
    active: boolean;
}

export interface Deposit {
    id: number;
    userId: string;
    machineId: string;
    materialName: string;
    grams: number;
    centiPoints: number; // frozen at write time
    transactionId: string;
    createdAt: Date;
    notes: string;
}

export interface DepositView extends Deposit {
    machineLocation: string;
}

export type NewDeposit = Omit<Deposit, "id">;

export interface LedgerTotals {
    centiPoints: number;
    grams: number;
}

export interface UserAggregate extends LedgerTotals {
    userId: string;
    updatedAt: Date;
}

export interface PeriodTotals extends LedgerTotals {
    count: number;
}

export interface MaterialBreakdown extends PeriodTotals {
    materialName: string;
}

export interface MachineUsage {
    machineId: string;
    location: string;
    count: number;
    grams: number;
}

export interface MaterialUsage {
    name: string;
    centiPointsPerKg: number;
    count: number;
    grams: number;
}

export interface SystemStats {
    totals: PeriodTotals;
    topMaterials: MaterialUsage[];
    topMachines: MachineUsage[];
}

export interface DepositQuery {
    userId: string;
    material?: string; // case-insensitive substring of the material name
    dateFrom?: Date; // inclusive
    dateTo?: Date; // exclusive
    offset: number;
    limit: number;
}

export interface DepositPage {
    deposits: DepositView[];
    total: number;
}

export const ZERO_TOTALS: LedgerTotals = { centiPoints: 0, grams: 0 };

/**
 * Work done while holding the lock on one user's aggregate row.
 * Everything written through it commits together or not at all.
 */
export interface UserTransaction {
    /** The user's aggregate as locked at the start of the transaction. */
    readonly aggregate: UserAggregate;
    countDepositsSince(since: Date): Promise<number>;
    insertDeposit(entry: NewDeposit): Promise<Deposit>;
    sumDeposits(): Promise<LedgerTotals>;
    writeAggregate(totals: LedgerTotals): Promise<UserAggregate>;
}

export interface LedgerStore {
    findActiveMaterial(name: string): Promise<Material | undefined>;
    findActiveMachine(machineId: string): Promise<Machine | undefined>;
    listActiveMaterials(): Promise<Material[]>;
    listActiveMachines(): Promise<Machine[]>;
    upsertMaterial(material: Material): Promise<Material>;
    upsertMachine(machine: Machine): Promise<Machine>;

    /**
     * Runs `work` with the user's aggregate row created (zeroed) if missing and locked.
     * Rejections from `work` roll the whole transaction back and are rethrown.
     */
    withUserTransaction<T>(userId: string, work: (tx: UserTransaction) => Promise<T>): Promise<T>;

    getAggregate(userId: string): Promise<UserAggregate | undefined>;
    listAggregateUserIds(): Promise<string[]>;
    countUsersAbove(centiPoints: number): Promise<number>;

    listDeposits(query: DepositQuery): Promise<DepositPage>;
    totalsSince(userId: string, since: Date): Promise<PeriodTotals>;
    materialBreakdown(userId: string): Promise<MaterialBreakdown[]>;
    systemStats(): Promise<SystemStats>;
    catalogCounts(): Promise<{ materials: number; machines: number; users: number }>;
}

export class StoreError extends Error {
    constructor(message: string, cause?: unknown) {
        super(message, { cause });
        this.name = "StoreError";
    }
}
