type LogLevel = 'debug' | 'info' | 'warn' | 'error';

type LogMeta = Record<string, unknown>;

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
};

const isLogLevel = (value: string): value is LogLevel => value in LEVEL_ORDER;

const currentThreshold = (): number => {
    const configured = (process.env.LOG_LEVEL || 'info').toLowerCase();
    return LEVEL_ORDER[isLogLevel(configured) ? configured : 'info'];
};

// Error instances serialize to {} under JSON.stringify
const serializeValue = (value: unknown): unknown => {
    if (value instanceof Error) {
        return { name: value.name, message: value.message };
    }
    return value;
};

const formatMeta = (meta?: LogMeta): string => {
    if (!meta || Object.keys(meta).length === 0) return '';
    const safe: LogMeta = {};
    for (const [key, value] of Object.entries(meta)) {
        safe[key] = serializeValue(value);
    }
    try {
        return ` ${JSON.stringify(safe)}`;
    } catch {
        return ' [unserializable meta]';
    }
};

const write = (level: LogLevel, message: string, meta?: LogMeta) => {
    if (LEVEL_ORDER[level] < currentThreshold()) return;

    const line = `[${new Date().toISOString()}] [${level.toUpperCase()}] ${message}${formatMeta(meta)}`;
    if (level === 'error') {
        console.error(line);
    } else if (level === 'warn') {
        console.warn(line);
    } else {
        console.log(line);
    }
};

export const loggerService = {
    debug: (message: string, meta?: LogMeta) => write('debug', message, meta),
    info: (message: string, meta?: LogMeta) => write('info', message, meta),
    warn: (message: string, meta?: LogMeta) => write('warn', message, meta),
    error: (message: string, meta?: LogMeta) => write('error', message, meta),
};
