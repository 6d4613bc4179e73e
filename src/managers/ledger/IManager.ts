import { IExpenseRecord, IExpenseRowSet } from '@shared';
import { IResult } from '@utils';

export enum LedgerErrorCode {
    ConstraintViolation = 'ConstraintViolation',
    InvalidInput = 'InvalidInput',
    NotFound = 'NotFound',
}

export type AddExpenseErrorCode = LedgerErrorCode.ConstraintViolation | LedgerErrorCode.InvalidInput;

export interface IManager {
    addExpense(amount: string, memo: string, date?: string): Promise<IResult<IExpenseRecord, AddExpenseErrorCode>>;
    listExpenses(): Promise<IExpenseRowSet>;
    searchExpenses(query: string): Promise<IExpenseRowSet>;
    deleteExpense(id: number): Promise<IResult<IExpenseRecord, LedgerErrorCode.NotFound>>;

    /** @returns number of removed expenses */
    clearExpenses(): Promise<number>;
}
