import { pino } from 'pino';

import { config } from '../../Config';
import { getEnv } from '../../environment';
import { ILogger } from './ILogger';
import { PinoLogger } from './PinoLogger';

export * from './ILogger';

const STDERR = 2;

let logger: ILogger;

// stdout carries the ledger output, so logs always go to stderr
export const createLogger = (): ILogger => {
    if (!logger) {
        const { logLevel: level, logPretty } = getEnv();

        logger = new PinoLogger(
            config.serviceName,
            logPretty ?
                pino({
                    level,
                    transport: {
                        target: 'pino-pretty',
                        options: { colorize: true, destination: STDERR },
                    },
                }) :
                pino({ level }, pino.destination(STDERR)),
        );
    }

    return logger;
};
