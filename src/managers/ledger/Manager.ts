import { Expenses } from '@data-access';
import { IExpenseRecord, IExpenseRowSet } from '@shared';
import { ConstraintViolationError, createErrorResult, createSuccessResult, ILogger, InvalidInputError, IResult } from '@utils';

import { AddExpenseErrorCode, IManager, LedgerErrorCode } from './IManager';

export class Manager implements IManager {
    constructor(private readonly store: Expenses.IStore, private readonly logger: ILogger) {
    }

    async addExpense(amount: string, memo: string, date?: string): Promise<IResult<IExpenseRecord, AddExpenseErrorCode>> {
        const logger = this.logger.child({ amount, date });

        try {
            const expense = await this.store.add({ amount, memo, created_on: date });

            logger.info({ expenseId: expense.id }, 'Expense added');

            return createSuccessResult(expense);
        } catch (err) {
            if (err instanceof ConstraintViolationError) {
                logger.warn({ constraint: err.constraint }, 'Expense rejected by constraint');
                return createErrorResult(LedgerErrorCode.ConstraintViolation, err.message, { constraint: err.constraint });
            }

            if (err instanceof InvalidInputError) {
                logger.warn('Expense rejected as invalid input');
                return createErrorResult(LedgerErrorCode.InvalidInput, err.message);
            }

            throw err;
        }
    }

    async listExpenses(): Promise<IExpenseRowSet> {
        const rowSet = await this.store.list();

        this.logger.debug({ count: rowSet.rows.length }, 'Expenses listed');

        return rowSet;
    }

    async searchExpenses(query: string): Promise<IExpenseRowSet> {
        const rowSet = await this.store.search(query);

        this.logger.debug({ query, count: rowSet.rows.length }, 'Expenses searched');

        return rowSet;
    }

    async deleteExpense(id: number): Promise<IResult<IExpenseRecord, LedgerErrorCode.NotFound>> {
        const logger = this.logger.child({ expenseId: id });

        const expense = await this.store.delete(id);
        if (!expense) {
            logger.info('Expense to delete not found');
            return createErrorResult(LedgerErrorCode.NotFound, `There is no expense with the id '${id}'.`);
        }

        logger.info('Expense deleted');

        return createSuccessResult(expense);
    }

    async clearExpenses(): Promise<number> {
        const count = await this.store.clear();

        this.logger.info({ count }, 'Expenses cleared');

        return count;
    }
}
