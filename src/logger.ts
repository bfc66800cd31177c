import pino, { type Logger, type LevelWithSilent } from 'pino';

export type { Logger } from 'pino';

// =================================================================
// LOGGER
// =================================================================
// One root pino logger per process. Components take a child bound
// to { component } so every line says where it came from.
// Development gets pino-pretty; everything else gets JSON lines.
// =================================================================

export interface LoggerOptions {
    level: LevelWithSilent;
    environment: string;
}

export function createLogger({ level, environment }: LoggerOptions): Logger {
    return pino({
        name: 'admission-gateway',
        level,
        formatters: {
            level: (label: string) => ({ level: label }),
        },
        serializers: {
            err: pino.stdSerializers.err,
        },
        ...(environment === 'development' && {
            transport: {
                target: 'pino-pretty',
                options: {
                    colorize: true,
                    translateTime: 'SYS:standard',
                    ignore: 'pid,hostname',
                },
            },
        }),
    });
}

/** Logger that drops everything. Used by tests and tooling. */
export function silentLogger(): Logger {
    return pino({ level: 'silent' });
}
