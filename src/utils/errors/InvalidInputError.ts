/**
 * The database refused a value because of its representation
 * (numeric overflow, unparseable date and the like).
 */
export class InvalidInputError extends Error {
    constructor(readonly message: string) {
        super(message);

        this.name = this.constructor.name;
        Error.captureStackTrace(this, this.constructor);
    }
}
