import pino from 'pino';
import type { LogLevel } from '../types/index.js';

export interface LoggerOptions {
    level?: LogLevel;
    jsonLogs?: boolean;
    /** Replaces the stderr output */
    destination?: pino.DestinationStream;
}

type OutputMode = 'json' | 'pretty';

/**
 * Logger singleton. Modules take it at load time with `getLogger()`, so
 * `initLogger()` reconfigures this one instance instead of replacing it.
 */
let loggerInstance: pino.Logger | null = null;
let outputMode: OutputMode = 'pretty';
let outputOverride: pino.DestinationStream | null = null;
const outputs = new Map<OutputMode, pino.DestinationStream>();

function createOutput(mode: OutputMode): pino.DestinationStream {
    if (mode === 'json') return pino.destination(2);
    return pino.transport({
        target: 'pino-pretty',
        options: {
            colorize: true,
            translateTime: 'HH:MM:ss',
            ignore: 'pid,hostname',
            destination: 2,
        },
    });
}

// Outputs are opened on first write
function currentOutput(): pino.DestinationStream {
    if (outputOverride) return outputOverride;
    let output = outputs.get(outputMode);
    if (!output) {
        output = createOutput(outputMode);
        outputs.set(outputMode, output);
    }
    return output;
}

const router: pino.DestinationStream = {
    write(line: string): void {
        currentOutput().write(line);
    },
};

/**
 * Set the level and output of the logger.
 * Called once at CLI startup; JSON lines and pretty output both go to stderr.
 */
export function initLogger(options: LoggerOptions = {}): pino.Logger {
    const { level = 'info', jsonLogs = false } = options;
    outputMode = jsonLogs ? 'json' : 'pretty';
    outputOverride = options.destination ?? null;

    if (!loggerInstance) {
        loggerInstance = pino({ level }, router);
    }
    loggerInstance.level = level;
    return loggerInstance;
}

/**
 * Get the logger instance.
 * If not initialized, creates a default logger at RELWORK_LOG_LEVEL (or info).
 */
export function getLogger(): pino.Logger {
    return loggerInstance ?? initLogger({ level: parseLogLevel(process.env['RELWORK_LOG_LEVEL']) });
}

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug', 'silent'];

/**
 * Parse a log level string, falling back to info.
 */
export function parseLogLevel(value: string | undefined): LogLevel {
    return LOG_LEVELS.find((level) => level === value) ?? 'info';
}
