import winston from 'winston';
import { PROGRAM_NAME } from './constants';

export type LogLevel = 'error' | 'warn' | 'info' | 'verbose' | 'debug' | 'silly';

const createLogger = (level: LogLevel): winston.Logger => {
    const format = level === 'info' || level === 'warn' || level === 'error'
        ? winston.format.combine(
            winston.format.splat(),
            winston.format.colorize(),
            winston.format.printf(({ level, message }) => `${level}: ${message}`),
        )
        : winston.format.combine(
            winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
            winston.format.splat(),
            winston.format.errors({ stack: true }),
            winston.format.printf(({ timestamp, level, message, service, ...meta }) => {
                const metaString = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
                return `${timestamp} [${service}] ${level.toUpperCase()}: ${message}${metaString}`;
            }),
        );

    return winston.createLogger({
        level,
        format,
        defaultMeta: { service: PROGRAM_NAME },
        transports: [
            // Step outputs travel on stdout, so logs stay on stderr
            new winston.transports.Console({ stderrLevels: ['error', 'warn', 'info', 'verbose', 'debug', 'silly'] }),
        ],
    });
};

let logger: winston.Logger = createLogger('info');

export const setLogLevel = (level: LogLevel): void => {
    logger = createLogger(level);
};

export const getLogger = (): winston.Logger => logger;
