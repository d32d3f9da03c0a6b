import { Pool, QueryResultRow } from "pg";

export interface SqlExecutor {
    run<R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]): Promise<R[]>;
}

/** One pooled connection, held for the length of a transaction. */
export interface SqlSession extends SqlExecutor {
    release(): void;
}

export interface SqlConnector extends SqlExecutor {
    session(): Promise<SqlSession>;
    close(): Promise<void>;
}

export function createPool(connectionString: string): Pool {
    return new Pool({ connectionString, max: 10 });
}

export function pgConnector(pool: Pool): SqlConnector {
    return {
        run: async <R extends QueryResultRow>(text: string, values?: unknown[]) => (await pool.query<R>(text, values)).rows,
        session: async () => {
            const client = await pool.connect();
            return {
                run: async <R extends QueryResultRow>(text: string, values?: unknown[]) => (await client.query<R>(text, values)).rows,
                release: () => client.release()
            };
        },
        close: () => pool.end()
    };
}
