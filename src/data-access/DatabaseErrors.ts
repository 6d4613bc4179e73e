import { DatabaseError } from 'pg';

import { ConstraintViolationError, InvalidInputError } from '@utils';

/** SQLSTATE codes, see https://www.postgresql.org/docs/current/errcodes-appendix.html */
export enum SqlState {
    CheckViolation = '23514',
    DuplicateTable = '42P07',
}

const DATA_EXCEPTION_CLASS = '22';

export const isDatabaseError = (err: unknown, code?: SqlState): err is DatabaseError => {
    return err instanceof DatabaseError && (code === undefined || err.code === code);
};

/**
 * Maps engine failures caused by the written values onto the ledger's error types.
 * Anything else is returned untouched.
 */
export const toDataAccessError = (err: unknown): unknown => {
    if (!isDatabaseError(err)) {
        return err;
    }

    if (err.code === SqlState.CheckViolation) {
        return new ConstraintViolationError(err.constraint || 'unknown', err.message);
    }

    if (err.code && err.code.startsWith(DATA_EXCEPTION_CLASS)) {
        return new InvalidInputError(err.message);
    }

    return err;
};
