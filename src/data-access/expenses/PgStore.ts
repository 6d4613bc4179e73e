import { ExpenseRecordKeys, IExpenseRecord, IExpenseRowSet, IExpenseTotalRecord, INewExpenseRecord, SCHEMA } from '@shared';
import { today } from '@utils';

import { toDataAccessError } from '../DatabaseErrors';
import { IDbClient, IsolationLevel } from '../db-client';
import { IStore } from './IStore';

interface IFilter {
    condition: string;
    values: unknown[];
}

export class PgStore implements IStore {
    private readonly tableName: string = SCHEMA.TABLE_NAMES.EXPENSES;

    constructor(private readonly dbClient: IDbClient) {
    }

    async add({ amount, memo, created_on }: INewExpenseRecord): Promise<IExpenseRecord> {
        try {
            const result = await this.dbClient.query<IExpenseRecord>({
                text: `
                    INSERT INTO "${this.tableName}"
                        ("${ExpenseRecordKeys.amount}", "${ExpenseRecordKeys.memo}", "${ExpenseRecordKeys.created_on}")
                    VALUES ($1, $2, $3)
                    RETURNING *
                `,
                values: [
                    amount,
                    memo,
                    created_on || today(),
                ],
            });

            return result.rows[0];
        } catch (err) {
            throw toDataAccessError(err);
        }
    }

    async list(): Promise<IExpenseRowSet> {
        return this.selectRowSet();
    }

    async search(query: string): Promise<IExpenseRowSet> {
        return this.selectRowSet({
            condition: `"${ExpenseRecordKeys.memo}" ILIKE $1`,
            values: [`%${escapeLikePattern(query)}%`],
        });
    }

    async delete(id: number): Promise<IExpenseRecord | undefined> {
        const result = await this.dbClient.query<IExpenseRecord>({
            text: `
                DELETE FROM "${this.tableName}"
                WHERE "${ExpenseRecordKeys.id}"=$1
                RETURNING *
            `,
            values: [
                id,
            ],
        });

        return result.rows[0];
    }

    async clear(): Promise<number> {
        const result = await this.dbClient.query(`DELETE FROM "${this.tableName}"`);

        return result.rowCount;
    }

    private async selectRowSet(filter?: IFilter): Promise<IExpenseRowSet> {
        const where = filter ? `WHERE ${filter.condition}` : '';
        const values = filter ? filter.values : [];

        // rows and their total must come from the same snapshot
        return this.dbClient.transaction(async client => {
            const { rows } = await client.query<IExpenseRecord>({
                text: `
                    SELECT * FROM "${this.tableName}"
                    ${where}
                    ORDER BY "${ExpenseRecordKeys.id}" ASC
                `,
                values,
            });

            if (rows.length === 0) {
                return { rows };
            }

            const totals = await client.query<IExpenseTotalRecord>({
                text: `
                    SELECT SUM("${ExpenseRecordKeys.amount}") AS "total" FROM "${this.tableName}"
                    ${where}
                `,
                values,
            });

            return { rows, total: totals.rows[0].total };
        }, IsolationLevel.RepeatableRead);
    }
}

export const escapeLikePattern = (value: string): string => value.replace(/[\\%_]/g, c => `\\${c}`);
