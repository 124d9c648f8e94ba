import winston from 'winston';
import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';

import settings from './settings.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

const logsDir = settings.logDir || path.join(__dirname, '..', 'logs');

// Lower is more severe; perf sits above warn so timings survive a quiet console
const levels = {
    fatal: 0,
    error: 1,
    perf: 2,
    warn: 3,
    info: 4,
    http: 5,
    verbose: 6,
    debug: 7,
    silly: 8,
    trace: 9,
    cons: 10,
};

winston.addColors({
    fatal: 'redBG white',
    error: 'red',
    perf: 'magenta',
    warn: 'yellow',
    info: 'green',
    http: 'cyan',
    verbose: 'blue',
    debug: 'white',
    silly: 'grey',
    trace: 'grey',
    cons: 'inverse',
});

function isLevel(level: string): level is keyof typeof levels {
    return Object.prototype.hasOwnProperty.call(levels, level);
}

function resolveLevel(requested: string): keyof typeof levels {
    const level = requested.toLowerCase();
    if (isLevel(level)) return level;
    console.warn(`Invalid LOG_LEVEL "${requested}", falling back to "info". Valid levels: ${Object.keys(levels).join(', ')}`);
    return 'info';
}

// Ledger amounts are bigint; JSON.stringify would throw on them
const stringifyMeta = (meta: Record<string, unknown>): string =>
    Object.keys(meta).length
        ? JSON.stringify(meta, (_key, value: unknown) => (typeof value === 'bigint' ? value.toString() : value))
        : '';

const consoleFormat = winston.format.combine(
    winston.format.colorize(),
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.printf(({ timestamp, level, message, ...meta }) => `[${timestamp}] ${level}: ${message} ${stringifyMeta(meta)}`)
);

const logger = winston.createLogger({
    levels,
    level: resolveLevel(settings.logLevel),
    format: winston.format.errors({ stack: true }),
    transports: [new winston.transports.Console({ format: consoleFormat })],
});

if (settings.logToFile) {
    fs.mkdirSync(logsDir, { recursive: true });
    logger.add(
        new winston.transports.File({
            filename: path.join(logsDir, `ledger-${settings.ledgerAccount}.log`),
            format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
        })
    );
}

export default logger;
