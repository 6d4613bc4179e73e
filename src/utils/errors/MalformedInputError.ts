export class MalformedInputError extends Error {
    constructor(readonly message: string, readonly value?: string) {
        super(message);

        this.name = this.constructor.name;
        Error.captureStackTrace(this, this.constructor);
    }
}
