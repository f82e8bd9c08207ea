// src/utils/logger.ts
import winston from 'winston';

// The validated env imports this module, so the level is read straight from process.env
const validLevels = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'];
const requestedLevel = process.env.LOG_LEVEL || (process.env.NODE_ENV === 'development' ? 'debug' : 'info');
const initialLogLevel = validLevels.includes(requestedLevel) ? requestedLevel : 'info';

// Error instances carry their stack as the message
const enumerateErrorFormat = winston.format((info) => {
    if (info instanceof Error) {
        Object.assign(info, { message: info.stack });
    }
    return info;
});

const renderMeta = (meta: Record<string, unknown>): string => {
    const { stack, ...rest } = meta;
    let rendered = typeof stack === 'string' ? `\nStack: ${stack}` : '';
    if (Object.keys(rest).length > 0) {
        try {
            rendered += ` ${JSON.stringify(rest)}`;
        } catch {
            rendered += ' [meta serialization failed]';
        }
    }
    return rendered;
};

const logger = winston.createLogger({
    level: initialLogLevel,
    format: winston.format.combine(
        enumerateErrorFormat(),
        winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        winston.format.splat(),
    ),
    transports: [
        new winston.transports.Console({
            format: winston.format.combine(
                process.env.NODE_ENV === 'development'
                    ? winston.format.colorize()
                    : winston.format.uncolorize(),
                winston.format.printf(({ timestamp, level, message, ...meta }) => {
                    const text = typeof message === 'string' ? message : JSON.stringify(message);
                    return `[${String(timestamp)}] ${level}: ${text}${renderMeta(meta)}`;
                })
            ),
            stderrLevels: ['error'],
        }),
    ],
});

export default logger;
