import { KeyNameMap, PartialBy } from '../CommonTypes';

export interface IExpenseRecord {
    id: number;
    /** NUMERIC(6,2) exactly as the driver returns it, e.g. "12.50" */
    amount: string;
    memo: string;
    /** YYYY-MM-DD */
    created_on: string;
}

export type INewExpenseRecord = PartialBy<Omit<IExpenseRecord, 'id'>, 'created_on'>;

export const ExpenseRecordKeys: KeyNameMap<IExpenseRecord> = {
    id: 'id',
    amount: 'amount',
    memo: 'memo',
    created_on: 'created_on',
};

export interface IExpenseTotalRecord {
    total: string;
}

export interface IExpenseRowSet {
    rows: IExpenseRecord[];

    /** Sum of all amounts in `rows`, present only when `rows` is not empty */
    total?: string;
}
