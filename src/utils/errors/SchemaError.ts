export class SchemaError extends Error {
    constructor(readonly message: string, readonly innerError?: Error) {
        super(message);

        this.name = this.constructor.name;
        Error.captureStackTrace(this, this.constructor);
    }
}
