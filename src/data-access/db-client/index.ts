import { Pool, PoolConfig, QueryConfig, types } from 'pg';

import { ILogger } from '@utils';

const DATE_TYPE_OID = 1082;

// Keep DATE columns as 'YYYY-MM-DD' instead of a Date at local midnight
types.setTypeParser(DATE_TYPE_OID, (value: string) => value);

export interface IDbClient {
    query<T>(q: IQueryConfig): Promise<IQueryResult<T>>;
    transaction<T>(action: (dbClient: IDbClient) => Promise<T>, isolationLevel?: IsolationLevel): Promise<T>;
}

export interface IDbConnection extends IDbClient {
    end(): Promise<void>;
}

export type IQueryConfig = string | {
    text: string;
    values: unknown[];
}

export interface IQueryResult<T> {
    rows: T[];
    rowCount: number;
}

export enum IsolationLevel {
    RepeatableRead = 'REPEATABLE READ',
}

export interface IConnectionOptions {
    databaseUrl?: string;
    databaseName: string;
}

export const toPoolConfig = ({ databaseUrl, databaseName }: IConnectionOptions): PoolConfig => {
    // a single command runs per process, one connection is all it ever needs
    return databaseUrl ?
        { connectionString: databaseUrl, max: 1 } :
        { database: databaseName, max: 1 };
};

export function createDbClient(options: IConnectionOptions, logger: ILogger): IDbConnection {
    const pool = new Pool(toPoolConfig(options));
    pool.on('error', err => logger.error(err));

    return {
        query: async (q: IQueryConfig) => {
            const result = await pool.query(toQueryConfig(q));
            return { rows: result.rows, rowCount: result.rowCount ?? 0 };
        },

        transaction: async <T>(action: (dbClient: IDbClient) => Promise<T>, isolationLevel?: IsolationLevel) => {
            const client = await pool.connect();
            let releaseError: Error | undefined;

            const clientQuery = async (q: IQueryConfig) => {
                const result = await client.query(toQueryConfig(q));
                return { rows: result.rows, rowCount: result.rowCount ?? 0 };
            };

            const nestedTransaction = async <NT>(act: (_: IDbClient) => Promise<NT>): Promise<NT> => {
                return await act({
                    query: clientQuery,
                    transaction: nestedTransaction,
                });
            };

            try {
                await client.query(isolationLevel ? `BEGIN ISOLATION LEVEL ${isolationLevel}` : 'BEGIN');

                const result = await action({
                    query: clientQuery,
                    transaction: nestedTransaction,
                });

                await client.query('COMMIT');

                return result;
            } catch (err) {
                try {
                    await client.query('ROLLBACK');
                } catch (rollbackErr) {
                    // a client that cannot roll back must not go back to the pool
                    releaseError = rollbackErr instanceof Error ? rollbackErr : Error(String(rollbackErr));
                    logger.error(releaseError, { stage: 'rollback' });
                }

                throw err;
            } finally {
                client.release(releaseError);
            }
        },

        end: async () => {
            await pool.end();
        },
    };
}

const toQueryConfig = (q: IQueryConfig): QueryConfig => {
    return typeof q === 'string' ? { text: q } : { text: q.text, values: q.values };
};
