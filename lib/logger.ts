import type { Logger } from './types';

type Level = keyof Logger;

const LEVELS: Level[] = ['debug', 'info', 'warn', 'error'];

/**
 * Logger writing one line per entry, `level message {data}`, to a stream.
 * Entries below `minimum` are dropped.
 */
export function createStreamLogger(stream: { write(chunk: string): unknown }, minimum: Level = 'warn'): Logger {
    const threshold = LEVELS.indexOf(minimum);
    const emit = (level: Level) => (message: string, data?: Record<string, unknown>): void => {
        if (LEVELS.indexOf(level) < threshold) {
            return;
        }
        const suffix = data && Object.keys(data).length > 0 ? ` ${JSON.stringify(data)}` : '';
        stream.write(`${level} ${message}${suffix}\n`);
    };

    return {
        debug: emit('debug'),
        info: emit('info'),
        warn: emit('warn'),
        error: emit('error'),
    };
}
