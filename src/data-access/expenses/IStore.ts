import { IExpenseRecord, IExpenseRowSet, INewExpenseRecord } from '@shared';

export interface IStore {
    /**
     * Inserts one expense. `created_on` defaults to today.
     * Throws `ConstraintViolationError` when the amount is not positive.
     */
    add(expense: INewExpenseRecord): Promise<IExpenseRecord>;
    list(): Promise<IExpenseRowSet>;

    /** Case-insensitive substring match on memo */
    search(query: string): Promise<IExpenseRowSet>;

    /** @returns the removed expense, or undefined when no expense has that id */
    delete(id: number): Promise<IExpenseRecord | undefined>;

    /** @returns the number of removed expenses */
    clear(): Promise<number>;
}
