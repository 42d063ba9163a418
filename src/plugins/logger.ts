import pino from 'pino';
import { config } from '../config/env.js';

function resolveLevel(): string {
    if (config.LOG_LEVEL) return config.LOG_LEVEL;
    if (config.NODE_ENV === 'test') return 'silent';
    return config.NODE_ENV === 'production' ? 'info' : 'debug';
}

const logger = pino({
    level: resolveLevel(),
    transport:
        config.NODE_ENV === 'development'
            ? { target: 'pino-pretty', options: { colorize: true } }
            : undefined
});

export default logger;
