import { IExpenseRecord, IExpenseRowSet } from '@shared';
import { formatAmount } from '@utils';

const ID_WIDTH = 4;
const AMOUNT_WIDTH = 10;
const TOTAL_VALUE_WIDTH = 26;
const RULE_WIDTH = 40;
const COLUMN_SEPARATOR = ' | ';

export function* renderTable(rows: Iterable<IExpenseRecord>): IterableIterator<string> {
    for (const { id, created_on, amount, memo } of rows) {
        yield [
            id.toString().padStart(ID_WIDTH),
            created_on,
            formatAmount(amount).padStart(AMOUNT_WIDTH),
            memo,
        ].join(COLUMN_SEPARATOR);
    }
}

export const renderSummary = (count: number): string => {
    switch (count) {
        case 0:
            return 'There are no expenses.';
        case 1:
            return 'There is 1 expense.';
        default:
            return `There are ${count} expenses.`;
    }
};

export function* renderTotal(sum: string): IterableIterator<string> {
    yield '-'.repeat(RULE_WIDTH);
    yield `Total${formatAmount(sum).padStart(TOTAL_VALUE_WIDTH)}`;
}

/** Summary line, then the table and total when there is anything to show */
export function* renderRowSet({ rows, total }: IExpenseRowSet): IterableIterator<string> {
    yield renderSummary(rows.length);

    if (rows.length === 0) {
        return;
    }

    yield* renderTable(rows);

    if (total !== undefined) {
        yield* renderTotal(total);
    }
}
