import * as fs from 'fs';
import * as path from 'path';

import { SCHEMA } from '@shared';
import { ILogger, SchemaError } from '@utils';

import { isDatabaseError, SqlState } from './DatabaseErrors';
import { IDbClient } from './db-client';
import { create as createExpensesStore, IStore as IExpensesStore } from './expenses';
import { ISchemaUnitOfWork } from './ISchemaUnitOfWork';

export const SCHEMA_INIT_SCRIPT = 'expenses.schema.sql';

export class PgSchemaUnitOfWork implements ISchemaUnitOfWork {
    expenses: IExpensesStore;

    constructor(private readonly dbClient: IDbClient, private readonly logger: ILogger) {
        this.expenses = createExpensesStore(this.dbClient);
    }

    async initSchema(): Promise<void> {
        const tableName = SCHEMA.TABLE_NAMES.EXPENSES;
        const logger = this.logger.child({ tableName });

        try {
            if (await this.tableExists(tableName)) {
                logger.debug('Schema initialization skipped. Table exists');
                return;
            }

            logger.info('Schema initialization started');

            await this.dbClient.query(await readScript(SCHEMA_INIT_SCRIPT));

            logger.info('Schema initialization finished');
        } catch (err) {
            // another process created the table between our check and our create
            if (isDatabaseError(err, SqlState.DuplicateTable)) {
                logger.info('Schema initialization skipped. Table created concurrently');
                return;
            }

            const innerError = err instanceof Error ? err : undefined;
            throw new SchemaError(`Schema initialization failed: ${String(err)}`, innerError);
        }
    }

    private async tableExists(tableName: string): Promise<boolean> {
        const result = await this.dbClient.query<{ exists: boolean }>({
            text: `
                SELECT EXISTS (
                    SELECT 1 FROM information_schema.tables
                    WHERE table_schema = current_schema() AND table_name = $1
                ) AS "exists"
            `,
            values: [
                tableName,
            ],
        });

        return result.rows[0].exists;
    }
}

const readScript = async (name: string): Promise<string> => {
    return await new Promise<string>((resolve, reject) => {
        fs.readFile(getPathFullName(name), 'utf8', (err, data) => {
            err ? reject(err) : resolve(data);
        });
    });
};

const getPathFullName = (fileName: string): string => {
    return path.resolve(__dirname, '../../assets', fileName);
};
