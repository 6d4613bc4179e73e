import { IExpenseRecord, IExpenseRowSet, INewExpenseRecord, SCHEMA } from '@shared';
import { amountToCents, ConstraintViolationError, formatAmount, InvalidInputError, sumAmounts, today } from '@utils';

import { IStore } from './IStore';

const MAX_CENTS = amountToCents('9999.99');

/**
 * Process-local store with the same observable behaviour as the expenses table,
 * including the positive amount check and NUMERIC(6,2) rounding.
 */
export class InMemoryStore implements IStore {
    private readonly expenses: IExpenseRecord[] = [];
    private lastId = 0;

    async add({ amount, memo, created_on }: INewExpenseRecord): Promise<IExpenseRecord> {
        const cents = amountToCents(amount);
        if (cents <= BigInt(0)) {
            throw new ConstraintViolationError(
                SCHEMA.CONSTRAINT_NAMES.POSITIVE_AMOUNT,
                `new row for relation "${SCHEMA.TABLE_NAMES.EXPENSES}" violates check constraint "${SCHEMA.CONSTRAINT_NAMES.POSITIVE_AMOUNT}"`,
            );
        }

        if (cents > MAX_CENTS) {
            throw new InvalidInputError('numeric field overflow');
        }

        const record: IExpenseRecord = {
            id: ++this.lastId,
            amount: formatAmount(amount),
            memo,
            created_on: created_on || today(),
        };

        this.expenses.push(record);

        return { ...record };
    }

    async list(): Promise<IExpenseRowSet> {
        return toRowSet(this.expenses);
    }

    async search(query: string): Promise<IExpenseRowSet> {
        const needle = query.toLowerCase();
        return toRowSet(this.expenses.filter(e => e.memo.toLowerCase().includes(needle)));
    }

    async delete(id: number): Promise<IExpenseRecord | undefined> {
        const index = this.expenses.findIndex(e => e.id === id);
        if (index === -1) {
            return undefined;
        }

        const [removed] = this.expenses.splice(index, 1);
        return removed;
    }

    async clear(): Promise<number> {
        return this.expenses.splice(0, this.expenses.length).length;
    }

    get count(): number {
        return this.expenses.length;
    }
}

const toRowSet = (expenses: IExpenseRecord[]): IExpenseRowSet => {
    const rows = expenses.map(e => ({ ...e }));
    if (rows.length === 0) {
        return { rows };
    }

    return {
        rows,
        total: sumAmounts(...rows.map(e => e.amount)),
    };
};
