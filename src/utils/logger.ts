export interface Logger {
    debug: (message: string, metadata?: unknown) => void;
    info: (message: string, metadata?: unknown) => void;
    warn: (message: string, metadata?: unknown) => void;
    error: (message: string, metadata?: unknown) => void;
}

export enum LogLevel {
    DEBUG,
    INFO,
    WARNING,
    ERROR,
}

export const jsonSerializer = (_: unknown, v: unknown) => {
    if (v instanceof Error) {
        return Object.getOwnPropertyNames(v).reduce(
            (acc, key) => {
                acc[key] = Reflect.get(v, key);
                return acc;
            },
            {} as Record<string, unknown>,
        );
    }
    if (Buffer.isBuffer(v)) {
        return v.toString();
    }
    if (typeof v === 'bigint') {
        return v.toString();
    }
    return v;
};

const write = (level: LogLevel, label: string, message: string, metadata: unknown) => {
    if (logLevel > level) return;
    const line = JSON.stringify({ message, metadata, level: label }, jsonSerializer);
    if (level === LogLevel.ERROR) console.error(line);
    else if (level === LogLevel.WARNING) console.warn(line);
    else if (level === LogLevel.INFO) console.info(line);
    else console.debug(line);
};

class JsonLogger implements Logger {
    debug(message: string, metadata?: unknown) {
        write(LogLevel.DEBUG, 'debug', message, metadata);
    }
    info(message: string, metadata?: unknown) {
        write(LogLevel.INFO, 'info', message, metadata);
    }
    warn(message: string, metadata?: unknown) {
        write(LogLevel.WARNING, 'warning', message, metadata);
    }
    error(message: string, metadata?: unknown) {
        write(LogLevel.ERROR, 'error', message, metadata);
    }
}

export let log: Logger = new JsonLogger();
export const setLogger = (newLogger: Logger) => {
    log = newLogger;
};

let logLevel: LogLevel = LogLevel.INFO;
export const setLogLevel = (newLogLevel: LogLevel) => {
    logLevel = newLogLevel;
};
