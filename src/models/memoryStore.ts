// In-process LedgerStore. A per-user queue stands in for the row lock PostgreSQL takes,
// and writes are staged on the transaction until it commits.
import {
    Deposit,
    DepositPage,
    DepositQuery,
    DepositView,
    LedgerStore,
    LedgerTotals,
    Machine,
    MachineUsage,
    Material,
    MaterialBreakdown,
    MaterialUsage,
    NewDeposit,
    PeriodTotals,
    StoreError,
    SystemStats,
    UserAggregate,
    UserTransaction
} from "./store";

function sum(deposits: Deposit[]): PeriodTotals {
    return deposits.reduce(
        (totals, deposit) => ({
            centiPoints: totals.centiPoints + deposit.centiPoints,
            grams: totals.grams + deposit.grams,
            count: totals.count + 1
        }),
        { centiPoints: 0, grams: 0, count: 0 }
    );
}

class MemoryUserTransaction implements UserTransaction {
    readonly staged: Deposit[] = [];
    written: UserAggregate | undefined;

    constructor(private readonly store: MemoryLedgerStore, readonly aggregate: UserAggregate) {}

    private ledger(): Deposit[] {
        return [...this.store.depositsOf(this.aggregate.userId), ...this.staged];
    }

    async countDepositsSince(since: Date): Promise<number> {
        return this.ledger().filter(deposit => deposit.createdAt >= since).length;
    }

    async insertDeposit(entry: NewDeposit): Promise<Deposit> {
        if (this.store.hasTransactionId(entry.transactionId) || this.staged.some(d => d.transactionId === entry.transactionId)) {
            throw new StoreError(`Duplicate transaction id ${entry.transactionId}`);
        }
        const previous = this.ledger().at(-1);
        // created_at never goes backwards within a user's ledger
        const createdAt = previous && previous.createdAt > entry.createdAt ? previous.createdAt : entry.createdAt;
        const deposit: Deposit = { ...entry, id: this.store.nextDepositId(), createdAt: new Date(createdAt) };
        this.staged.push(deposit);
        return { ...deposit };
    }

    async sumDeposits(): Promise<LedgerTotals> {
        const { centiPoints, grams } = sum(this.ledger());
        return { centiPoints, grams };
    }

    async writeAggregate(totals: LedgerTotals): Promise<UserAggregate> {
        this.written = {
            userId: this.aggregate.userId,
            centiPoints: totals.centiPoints,
            grams: totals.grams,
            updatedAt: new Date()
        };
        return { ...this.written };
    }
}

export class MemoryLedgerStore implements LedgerStore {
    public materials: Map<string, Material> = new Map(); // keyed by lower-cased name
    public machines: Map<string, Machine> = new Map(); // keyed by lower-cased machine id
    public deposits: Deposit[] = [];
    public aggregates: Map<string, UserAggregate> = new Map();

    private depositSeq = 0;
    private userQueues: Map<string, Promise<void>> = new Map();

    nextDepositId(): number {
        this.depositSeq += 1;
        return this.depositSeq;
    }

    depositsOf(userId: string): Deposit[] {
        return this.deposits.filter(deposit => deposit.userId === userId);
    }

    hasTransactionId(transactionId: string): boolean {
        return this.deposits.some(deposit => deposit.transactionId === transactionId);
    }

    async findActiveMaterial(name: string): Promise<Material | undefined> {
        const material = this.materials.get(name.trim().toLowerCase());
        return material?.active ? { ...material } : undefined;
    }

    async findActiveMachine(machineId: string): Promise<Machine | undefined> {
        const machine = this.machines.get(machineId.trim().toLowerCase());
        return machine?.active ? { ...machine } : undefined;
    }

    async listActiveMaterials(): Promise<Material[]> {
        return [...this.materials.values()]
            .filter(material => material.active)
            .sort((a, b) => a.name.localeCompare(b.name));
    }

    async listActiveMachines(): Promise<Machine[]> {
        return [...this.machines.values()]
            .filter(machine => machine.active)
            .sort((a, b) => a.machineId.localeCompare(b.machineId));
    }

    async upsertMaterial(material: Material): Promise<Material> {
        const key = material.name.toLowerCase();
        const existing = this.materials.get(key);
        // The first spelling of a name stays canonical
        const stored = { ...material, name: existing?.name ?? material.name };
        this.materials.set(key, stored);
        return { ...stored };
    }

    async upsertMachine(machine: Machine): Promise<Machine> {
        const key = machine.machineId.toLowerCase();
        const existing = this.machines.get(key);
        const stored = { ...machine, machineId: existing?.machineId ?? machine.machineId };
        this.machines.set(key, stored);
        return { ...stored };
    }

    private async serialize<T>(userId: string, work: () => Promise<T>): Promise<T> {
        const previous = this.userQueues.get(userId) ?? Promise.resolve();
        const run = previous.then(work);
        const settled = run.then(() => undefined, () => undefined);
        this.userQueues.set(userId, settled);
        try {
            return await run;
        } finally {
            if (this.userQueues.get(userId) === settled) {
                this.userQueues.delete(userId);
            }
        }
    }

    async withUserTransaction<T>(userId: string, work: (tx: UserTransaction) => Promise<T>): Promise<T> {
        return this.serialize(userId, async () => {
            const aggregate = this.aggregates.get(userId) ?? { userId, centiPoints: 0, grams: 0, updatedAt: new Date() };
            const tx = new MemoryUserTransaction(this, { ...aggregate });
            const result = await work(tx);
            // commit
            this.deposits.push(...tx.staged);
            this.aggregates.set(userId, tx.written ?? aggregate);
            return result;
        });
    }

    async getAggregate(userId: string): Promise<UserAggregate | undefined> {
        const aggregate = this.aggregates.get(userId);
        return aggregate ? { ...aggregate } : undefined;
    }

    async listAggregateUserIds(): Promise<string[]> {
        return [...this.aggregates.keys()].sort();
    }

    async countUsersAbove(centiPoints: number): Promise<number> {
        return [...this.aggregates.values()].filter(aggregate => aggregate.centiPoints > centiPoints).length;
    }

    private view(deposit: Deposit): DepositView {
        const machine = this.machines.get(deposit.machineId.toLowerCase());
        return { ...deposit, machineLocation: machine?.location ?? "" };
    }

    async listDeposits(query: DepositQuery): Promise<DepositPage> {
        const material = query.material?.toLowerCase();
        const matching = this.depositsOf(query.userId)
            .filter(deposit => !material || deposit.materialName.toLowerCase().includes(material))
            .filter(deposit => !query.dateFrom || deposit.createdAt >= query.dateFrom)
            .filter(deposit => !query.dateTo || deposit.createdAt < query.dateTo)
            .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime() || b.id - a.id);
        return {
            deposits: matching.slice(query.offset, query.offset + query.limit).map(deposit => this.view(deposit)),
            total: matching.length
        };
    }

    async totalsSince(userId: string, since: Date): Promise<PeriodTotals> {
        return sum(this.depositsOf(userId).filter(deposit => deposit.createdAt >= since));
    }

    async materialBreakdown(userId: string): Promise<MaterialBreakdown[]> {
        const byMaterial: Map<string, Deposit[]> = new Map();
        for (const deposit of this.depositsOf(userId)) {
            byMaterial.set(deposit.materialName, [...(byMaterial.get(deposit.materialName) ?? []), deposit]);
        }
        return [...byMaterial.entries()]
            .map(([materialName, deposits]) => ({ materialName, ...sum(deposits) }))
            .sort((a, b) => b.grams - a.grams || a.materialName.localeCompare(b.materialName));
    }

    async systemStats(): Promise<SystemStats> {
        const topMaterials: MaterialUsage[] = [...this.materials.values()]
            .map(material => {
                const totals = sum(this.deposits.filter(deposit => deposit.materialName === material.name));
                return { name: material.name, centiPointsPerKg: material.centiPointsPerKg, count: totals.count, grams: totals.grams };
            })
            .sort((a, b) => b.grams - a.grams || a.name.localeCompare(b.name))
            .slice(0, 5);
        const topMachines: MachineUsage[] = [...this.machines.values()]
            .filter(machine => machine.active)
            .map(machine => {
                const totals = sum(this.deposits.filter(deposit => deposit.machineId === machine.machineId));
                return { machineId: machine.machineId, location: machine.location, count: totals.count, grams: totals.grams };
            })
            .sort((a, b) => b.count - a.count || a.machineId.localeCompare(b.machineId))
            .slice(0, 10);
        return { totals: sum(this.deposits), topMaterials, topMachines };
    }

    async catalogCounts(): Promise<{ materials: number; machines: number; users: number }> {
        return { materials: this.materials.size, machines: this.machines.size, users: this.aggregates.size };
    }

    clear() {
        this.materials.clear();
        this.machines.clear();
        this.deposits = [];
        this.aggregates.clear();
        this.depositSeq = 0;
    }
}
