export class ConstraintViolationError extends Error {
    constructor(readonly constraint: string, readonly message: string) {
        super(message);

        this.name = this.constructor.name;
        Error.captureStackTrace(this, this.constructor);
    }
}
