import { Logger } from 'pino';

import { ILogger } from './ILogger';

export class PinoLogger implements ILogger {
    constructor(private readonly serviceName: string, private readonly pino: Logger) {
    }

    info(obj: string | object, msg?: string): void {
        this.pino.info(this.build(obj, msg));
    }

    debug(obj: string | object, msg?: string): void {
        this.pino.debug(this.build(obj, msg));
    }

    warn(obj: string | object, msg?: string): void {
        this.pino.warn(this.build(obj, msg));
    }

    error(error: Error, obj?: object): Error {
        const payload = this.build(typeof obj === 'undefined' ? {} : obj, error.message);
        this.pino.error({
            err: error,
            ...payload,
        });

        return error;
    }

    child(indexes: Record<string, unknown>): ILogger {
        return new PinoLogger(this.serviceName, this.pino.child(indexes));
    }

    private build(obj: string | object, msg?: string): Record<string, unknown> {
        const res: Record<string, unknown> = typeof obj === 'string' ? { msg: obj } : { ...obj };
        if (msg) {
            res.msg = msg;
        }

        res.service = this.serviceName;

        return res;
    }
}
