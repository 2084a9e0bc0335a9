// Settings read once from the environment.

type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

const under_test = process.env.VITEST !== undefined || process.env.NODE_ENV === 'test';

function parseLogLevel(value: string | undefined, fallback: LogLevel): LogLevel {
    const match = LOG_LEVELS.find(level => level === value);
    return match ?? fallback;
}

function parseFlag(value: string | undefined, fallback: boolean): boolean {
    if (value === undefined || value === '') return fallback;
    return value === '1' || value.toLowerCase() === 'true';
}

function parseSeed(value: string | undefined): number | undefined {
    if (value === undefined || value === '') return undefined;
    const seed = Number(value);
    return Number.isFinite(seed) ? seed : undefined;
}

export const log_level: LogLevel = parseLogLevel(process.env.LOG_LEVEL, under_test ? 'silent' : 'info');

// pretty output on stdout through the pino-pretty transport
export const log_pretty: boolean = parseFlag(process.env.LOG_PRETTY, !under_test);

// second destination, plain JSON lines
export const log_file: string | undefined = process.env.LOG_FILE || undefined;

// seeds the default random source used by WeightedMap.sample()
export const random_seed: number | undefined = parseSeed(process.env.RANDOM_SEED);

export type { LogLevel };
