import { z } from "zod";

const configSchema = z.object({
    NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
    PORT: z.coerce.number().int().positive().default(3000),
    LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
    SERVICE_NAME: z.string().min(1).default("rvm-deposit-ledger"),

    // Unset means the in-memory store / cache (single process only)
    DATABASE_URL: z.string().url().optional(),
    REDIS_URL: z.string().url().optional(),

    MAX_DEPOSIT_WEIGHT_KG: z.coerce.number().positive().default(50),
    DAILY_DEPOSIT_LIMIT: z.coerce.number().int().positive().default(50),
    VELOCITY_LIMIT: z.coerce.number().int().positive().default(10),
    VELOCITY_WINDOW_MINUTES: z.coerce.number().int().positive().default(5),
    DUPLICATE_WINDOW_SECONDS: z.coerce.number().int().positive().default(60),
    MACHINE_DAILY_CAPACITY_KG: z.coerce.number().positive().default(500),

    HISTORY_PAGE_SIZE: z.coerce.number().int().positive().max(100).default(20),
    RECONCILE_INTERVAL_MINUTES: z.coerce.number().int().nonnegative().default(60)
});

export type AppConfig = z.infer<typeof configSchema>;

export class ConfigError extends Error {
    constructor(readonly invalid: string[]) {
        super(`Invalid configuration: ${invalid.join(", ")}`);
        this.name = "ConfigError";
    }
}

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
    const parsed = configSchema.safeParse(env);
    if (!parsed.success) {
        throw new ConfigError(parsed.error.issues.map(issue => `${issue.path.join(".")}: ${issue.message}`));
    }
    return parsed.data;
}
