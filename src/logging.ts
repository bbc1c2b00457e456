import winston from 'winston';
import { PROGRAM_NAME } from './constants';

export type LogLevel = 'error' | 'warn' | 'info' | 'verbose' | 'debug' | 'silly';

const createLogger = (level: LogLevel = 'info'): winston.Logger => {
    let format = winston.format.combine(
        winston.format.errors({ stack: true }),
        winston.format.splat(),
    );

    if (level === 'info') {
        format = winston.format.combine(
            format,
            winston.format.printf(({ message }) => `${message}`),
        );
    } else {
        format = winston.format.combine(
            format,
            winston.format.timestamp(),
            winston.format.printf(({ timestamp, level, message, ...meta }) => {
                const { service: _service, ...rest } = meta;
                const metaString = Object.keys(rest).length ? ` ${JSON.stringify(rest)}` : '';
                return `${timestamp} ${level}: ${message}${metaString}`;
            }),
        );
    }

    return winston.createLogger({
        level,
        format,
        defaultMeta: { service: PROGRAM_NAME },
        transports: [
            new winston.transports.Console({ stderrLevels: ['error', 'warn'] }),
        ],
    });
};

let logger = createLogger();

export const setLogLevel = (level: LogLevel): void => {
    logger = createLogger(level);
};

export const getLogger = (): winston.Logger => logger;
