import path from 'path';
import { z } from 'zod';

const NODE_ENVS = ['development', 'production', 'test'] as const;
const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type NodeEnv = (typeof NODE_ENVS)[number];
export type LogLevel = (typeof LOG_LEVELS)[number];

const envSchema = z.object({
    NODE_ENV: z.enum(NODE_ENVS).default('development'),
    PORT: z.coerce.number().int().min(1).max(65535).default(3000),
    DATABASE_PATH: z.string().trim().min(1).optional(),
    LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
});

export interface Config {
    nodeEnv: NodeEnv;
    port: number;
    databasePath: string;
    logLevel: LogLevel;
}

export class ConfigError extends Error {
    constructor(readonly issues: string[]) {
        super(`Invalid environment variables:\n${issues.map((i) => `  ${i}`).join('\n')}`);
        this.name = 'ConfigError';
    }
}

function defaultLogLevel(nodeEnv: NodeEnv): LogLevel {
    if (nodeEnv === 'test') return 'silent';
    return nodeEnv === 'production' ? 'info' : 'debug';
}

/** Validate the environment into a Config. Empty strings count as unset. */
export function loadConfig(env: NodeJS.ProcessEnv, cwd: string = process.cwd()): Config {
    const raw = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ''));
    const parsed = envSchema.safeParse(raw);
    if (!parsed.success) {
        throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
    }
    const e = parsed.data;

    return {
        nodeEnv: e.NODE_ENV,
        port: e.PORT,
        databasePath: e.DATABASE_PATH ?? path.join(cwd, 'data', 'media.db'),
        logLevel: e.LOG_LEVEL ?? defaultLogLevel(e.NODE_ENV),
    };
}
