import * as winston from 'winston';

export type Logger = winston.Logger;

export const createLogger = (service: string, level: string = process.env.LOG_LEVEL || 'info'): Logger => {
    return winston.createLogger({
        level,
        format: winston.format.json(),
        defaultMeta: { service },
        silent: process.env.NODE_ENV === 'test',
        transports: [
            new winston.transports.Console()
        ]
    });
};

export const logger = createLogger(process.env.SERVICE_NAME || 'tool-adapter');
