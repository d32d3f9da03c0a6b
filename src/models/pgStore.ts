import fs from "node:fs";
import path from "node:path";
import { SqlConnector, SqlExecutor, SqlSession } from "./sql";
import {
    Deposit,
    DepositPage,
    DepositQuery,
    DepositView,
    LedgerStore,
    LedgerTotals,
    Machine,
    Material,
    MaterialBreakdown,
    NewDeposit,
    PeriodTotals,
    StoreError,
    SystemStats,
    UserAggregate,
    UserTransaction
} from "./store";

const SCHEMA_PATH = path.join(__dirname, "../../sql/schema.sql");

// BIGINT and COUNT come back from pg as strings
type Numeric = number | string;

type MaterialRow = {
    name: string;
    centi_points_per_kg: number;
    description: string;
    active: boolean;
};

type MachineRow = {
    machine_id: string;
    location: string;
    latitude: number | null;
    longitude: number | null;
    active: boolean;
};

type DepositRow = {
    id: Numeric;
    user_id: string;
    machine_id: string;
    material_name: string;
    grams: number;
    centi_points: number;
    transaction_id: string;
    created_at: Date;
    notes: string;
};

type DepositViewRow = DepositRow & {
    machine_location: string;
};

type AggregateRow = {
    user_id: string;
    centi_points: Numeric;
    grams: Numeric;
    updated_at: Date;
};

type TotalsRow = {
    centi_points: Numeric;
    grams: Numeric;
    count: Numeric;
};

const DEPOSIT_COLUMNS = "id, user_id, machine_id, material_name, grams, centi_points, transaction_id, created_at, notes";
const TOTALS_COLUMNS = "coalesce(sum(centi_points), 0) AS centi_points, coalesce(sum(grams), 0) AS grams, count(*) AS count";

function toMaterial(row: MaterialRow): Material {
    return {
        name: row.name,
        centiPointsPerKg: row.centi_points_per_kg,
        description: row.description,
        active: row.active
    };
}

function toMachine(row: MachineRow): Machine {
    return {
        machineId: row.machine_id,
        location: row.location,
        latitude: row.latitude,
        longitude: row.longitude,
        active: row.active
    };
}

function toDeposit(row: DepositRow): Deposit {
    return {
        id: Number(row.id),
        userId: row.user_id,
        machineId: row.machine_id,
        materialName: row.material_name,
        grams: row.grams,
        centiPoints: row.centi_points,
        transactionId: row.transaction_id,
        createdAt: row.created_at,
        notes: row.notes
    };
}

function toAggregate(row: AggregateRow): UserAggregate {
    return {
        userId: row.user_id,
        centiPoints: Number(row.centi_points),
        grams: Number(row.grams),
        updatedAt: row.updated_at
    };
}

function toTotals(row: TotalsRow | undefined): PeriodTotals {
    return {
        centiPoints: Number(row?.centi_points ?? 0),
        grams: Number(row?.grams ?? 0),
        count: Number(row?.count ?? 0)
    };
}

function likePattern(fragment: string): string {
    return `%${fragment.replace(/[\\%_]/g, "\\$&")}%`;
}

class PgUserTransaction implements UserTransaction {
    constructor(private readonly session: SqlExecutor, readonly aggregate: UserAggregate) {}

    async countDepositsSince(since: Date): Promise<number> {
        const rows = await this.session.run<{ count: Numeric }>(
            "SELECT count(*) AS count FROM deposits WHERE user_id = $1 AND created_at >= $2",
            [this.aggregate.userId, since]
        );
        return Number(rows[0]?.count ?? 0);
    }

    async insertDeposit(entry: NewDeposit): Promise<Deposit> {
        // created_at never goes backwards within a user's ledger; the aggregate lock serializes this read
        const rows = await this.session.run<DepositRow>(
            `INSERT INTO deposits (user_id, machine_id, material_name, grams, centi_points, transaction_id, created_at, notes)
             VALUES ($1, $2, $3, $4, $5, $6,
                     GREATEST($7::timestamptz, (SELECT max(created_at) FROM deposits WHERE user_id = $1)), $8)
             RETURNING ${DEPOSIT_COLUMNS}`,
            [
                entry.userId,
                entry.machineId,
                entry.materialName,
                entry.grams,
                entry.centiPoints,
                entry.transactionId,
                entry.createdAt,
                entry.notes
            ]
        );
        const row = rows[0];
        if (!row) {
            throw new StoreError(`Insert of deposit ${entry.transactionId} returned no row`);
        }
        return toDeposit(row);
    }

    async sumDeposits(): Promise<LedgerTotals> {
        const rows = await this.session.run<TotalsRow>(
            `SELECT ${TOTALS_COLUMNS} FROM deposits WHERE user_id = $1`,
            [this.aggregate.userId]
        );
        const { centiPoints, grams } = toTotals(rows[0]);
        return { centiPoints, grams };
    }

    async writeAggregate(totals: LedgerTotals): Promise<UserAggregate> {
        const rows = await this.session.run<AggregateRow>(
            `UPDATE user_aggregates SET centi_points = $2, grams = $3, updated_at = now()
             WHERE user_id = $1
             RETURNING user_id, centi_points, grams, updated_at`,
            [this.aggregate.userId, totals.centiPoints, totals.grams]
        );
        const row = rows[0];
        if (!row) {
            throw new StoreError(`Aggregate row for ${this.aggregate.userId} vanished inside its transaction`);
        }
        return toAggregate(row);
    }
}

export class PgLedgerStore implements LedgerStore {
    constructor(private readonly db: SqlConnector) {}

    async migrate(): Promise<void> {
        await this.db.run(fs.readFileSync(SCHEMA_PATH, "utf8"));
    }

    async findActiveMaterial(name: string): Promise<Material | undefined> {
        const rows = await this.db.run<MaterialRow>(
            "SELECT name, centi_points_per_kg, description, active FROM materials WHERE lower(name) = lower($1) AND active LIMIT 1",
            [name.trim()]
        );
        return rows[0] && toMaterial(rows[0]);
    }

    async findActiveMachine(machineId: string): Promise<Machine | undefined> {
        const rows = await this.db.run<MachineRow>(
            "SELECT machine_id, location, latitude, longitude, active FROM machines WHERE lower(machine_id) = lower($1) AND active LIMIT 1",
            [machineId.trim()]
        );
        return rows[0] && toMachine(rows[0]);
    }

    async listActiveMaterials(): Promise<Material[]> {
        const rows = await this.db.run<MaterialRow>(
            "SELECT name, centi_points_per_kg, description, active FROM materials WHERE active ORDER BY name"
        );
        return rows.map(toMaterial);
    }

    async listActiveMachines(): Promise<Machine[]> {
        const rows = await this.db.run<MachineRow>(
            "SELECT machine_id, location, latitude, longitude, active FROM machines WHERE active ORDER BY machine_id"
        );
        return rows.map(toMachine);
    }

    async upsertMaterial(material: Material): Promise<Material> {
        const rows = await this.db.run<MaterialRow>(
            `INSERT INTO materials (name, centi_points_per_kg, description, active) VALUES ($1, $2, $3, $4)
             ON CONFLICT ((lower(name))) DO UPDATE
             SET centi_points_per_kg = EXCLUDED.centi_points_per_kg, description = EXCLUDED.description, active = EXCLUDED.active
             RETURNING name, centi_points_per_kg, description, active`,
            [material.name, material.centiPointsPerKg, material.description, material.active]
        );
        const row = rows[0];
        if (!row) {
            throw new StoreError(`Upsert of material ${material.name} returned no row`);
        }
        return toMaterial(row);
    }

    async upsertMachine(machine: Machine): Promise<Machine> {
        const rows = await this.db.run<MachineRow>(
            `INSERT INTO machines (machine_id, location, latitude, longitude, active) VALUES ($1, $2, $3, $4, $5)
             ON CONFLICT ((lower(machine_id))) DO UPDATE
             SET location = EXCLUDED.location, latitude = EXCLUDED.latitude, longitude = EXCLUDED.longitude, active = EXCLUDED.active
             RETURNING machine_id, location, latitude, longitude, active`,
            [machine.machineId, machine.location, machine.latitude, machine.longitude, machine.active]
        );
        const row = rows[0];
        if (!row) {
            throw new StoreError(`Upsert of machine ${machine.machineId} returned no row`);
        }
        return toMachine(row);
    }

    private async lockAggregate(session: SqlSession, userId: string): Promise<UserAggregate> {
        await session.run(
            "INSERT INTO user_aggregates (user_id) VALUES ($1) ON CONFLICT (user_id) DO NOTHING",
            [userId]
        );
        const rows = await session.run<AggregateRow>(
            "SELECT user_id, centi_points, grams, updated_at FROM user_aggregates WHERE user_id = $1 FOR UPDATE",
            [userId]
        );
        const row = rows[0];
        if (!row) {
            throw new StoreError(`Could not lock aggregate row for ${userId}`);
        }
        return toAggregate(row);
    }

    async withUserTransaction<T>(userId: string, work: (tx: UserTransaction) => Promise<T>): Promise<T> {
        const session = await this.db.session();
        try {
            await session.run("BEGIN");
            const aggregate = await this.lockAggregate(session, userId);
            const result = await work(new PgUserTransaction(session, aggregate));
            await session.run("COMMIT");
            return result;
        } catch (error) {
            await session.run("ROLLBACK");
            throw error;
        } finally {
            session.release();
        }
    }

    async getAggregate(userId: string): Promise<UserAggregate | undefined> {
        const rows = await this.db.run<AggregateRow>(
            "SELECT user_id, centi_points, grams, updated_at FROM user_aggregates WHERE user_id = $1",
            [userId]
        );
        return rows[0] && toAggregate(rows[0]);
    }

    async listAggregateUserIds(): Promise<string[]> {
        const rows = await this.db.run<{ user_id: string }>("SELECT user_id FROM user_aggregates ORDER BY user_id");
        return rows.map(row => row.user_id);
    }

    async countUsersAbove(centiPoints: number): Promise<number> {
        const rows = await this.db.run<{ count: Numeric }>(
            "SELECT count(*) AS count FROM user_aggregates WHERE centi_points > $1",
            [centiPoints]
        );
        return Number(rows[0]?.count ?? 0);
    }

    async listDeposits(query: DepositQuery): Promise<DepositPage> {
        const where = `d.user_id = $1
            AND ($2::text IS NULL OR d.material_name ILIKE $2)
            AND ($3::timestamptz IS NULL OR d.created_at >= $3)
            AND ($4::timestamptz IS NULL OR d.created_at < $4)`;
        const filters = [
            query.userId,
            query.material ? likePattern(query.material) : null,
            query.dateFrom ?? null,
            query.dateTo ?? null
        ];
        const counted = await this.db.run<{ count: Numeric }>(
            `SELECT count(*) AS count FROM deposits d WHERE ${where}`,
            filters
        );
        const rows = await this.db.run<DepositViewRow>(
            `SELECT d.id, d.user_id, d.machine_id, d.material_name, d.grams, d.centi_points, d.transaction_id,
                    d.created_at, d.notes, m.location AS machine_location
             FROM deposits d JOIN machines m ON m.machine_id = d.machine_id
             WHERE ${where}
             ORDER BY d.created_at DESC, d.id DESC
             LIMIT $5 OFFSET $6`,
            [...filters, query.limit, query.offset]
        );
        const deposits: DepositView[] = rows.map(row => ({ ...toDeposit(row), machineLocation: row.machine_location }));
        return { deposits, total: Number(counted[0]?.count ?? 0) };
    }

    async totalsSince(userId: string, since: Date): Promise<PeriodTotals> {
        const rows = await this.db.run<TotalsRow>(
            `SELECT ${TOTALS_COLUMNS} FROM deposits WHERE user_id = $1 AND created_at >= $2`,
            [userId, since]
        );
        return toTotals(rows[0]);
    }

    async materialBreakdown(userId: string): Promise<MaterialBreakdown[]> {
        const rows = await this.db.run<TotalsRow & { material_name: string }>(
            `SELECT material_name, ${TOTALS_COLUMNS} FROM deposits WHERE user_id = $1
             GROUP BY material_name ORDER BY sum(grams) DESC, material_name`,
            [userId]
        );
        return rows.map(row => ({ materialName: row.material_name, ...toTotals(row) }));
    }

    async systemStats(): Promise<SystemStats> {
        const totals = await this.db.run<TotalsRow>(`SELECT ${TOTALS_COLUMNS} FROM deposits`);
        const materials = await this.db.run<{ name: string; centi_points_per_kg: number; count: Numeric; grams: Numeric }>(
            `SELECT m.name, m.centi_points_per_kg, count(d.id) AS count, coalesce(sum(d.grams), 0) AS grams
             FROM materials m LEFT JOIN deposits d ON d.material_name = m.name
             GROUP BY m.name, m.centi_points_per_kg
             ORDER BY coalesce(sum(d.grams), 0) DESC, m.name LIMIT 5`
        );
        const machines = await this.db.run<{ machine_id: string; location: string; count: Numeric; grams: Numeric }>(
            `SELECT m.machine_id, m.location, count(d.id) AS count, coalesce(sum(d.grams), 0) AS grams
             FROM machines m LEFT JOIN deposits d ON d.machine_id = m.machine_id
             WHERE m.active
             GROUP BY m.machine_id, m.location
             ORDER BY count(d.id) DESC, m.machine_id LIMIT 10`
        );
        return {
            totals: toTotals(totals[0]),
            topMaterials: materials.map(row => ({
                name: row.name,
                centiPointsPerKg: row.centi_points_per_kg,
                count: Number(row.count),
                grams: Number(row.grams)
            })),
            topMachines: machines.map(row => ({
                machineId: row.machine_id,
                location: row.location,
                count: Number(row.count),
                grams: Number(row.grams)
            }))
        };
    }

    async catalogCounts(): Promise<{ materials: number; machines: number; users: number }> {
        const rows = await this.db.run<{ materials: Numeric; machines: Numeric; users: Numeric }>(
            `SELECT (SELECT count(*) FROM materials) AS materials,
                    (SELECT count(*) FROM machines) AS machines,
                    (SELECT count(*) FROM user_aggregates) AS users`
        );
        return {
            materials: Number(rows[0]?.materials ?? 0),
            machines: Number(rows[0]?.machines ?? 0),
            users: Number(rows[0]?.users ?? 0)
        };
    }
}
