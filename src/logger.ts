import { pino } from 'pino';
import { config } from './config.js';

export const logger = pino({
    level: config.logLevel,
});

export function componentLogger(component: string) {
    return logger.child({ component });
}
