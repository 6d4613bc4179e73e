import * as TypeMoq from 'typemoq';

import { ILogger } from '@utils';

import { createDbClient, IDbClient, IsolationLevel, toPoolConfig } from './index';

interface IRecordedQuery {
    text: string;
}

const mockStatements: string[] = [];
const mockFailures = new Map<string, Error>();
const mockRelease = jest.fn();
const mockEnd = jest.fn();

const mockRun = async (q: string | IRecordedQuery) => {
    const text = typeof q === 'string' ? q : q.text;
    mockStatements.push(text);

    const failure = mockFailures.get(text);
    if (failure) {
        throw failure;
    }

    return { rows: [{ text }], rowCount: null };
};

jest.mock('pg', () => ({
    types: { setTypeParser: jest.fn() },
    Pool: class {
        on(): void {
        }

        async query(q: IRecordedQuery) {
            return mockRun(q);
        }

        async connect() {
            return {
                query: mockRun,
                release: mockRelease,
            };
        }

        async end() {
            mockEnd();
        }
    },
}));

describe('db-client', () => {
    let loggerMock: TypeMoq.IMock<ILogger>;

    beforeEach(() => {
        mockStatements.length = 0;
        mockFailures.clear();
        mockRelease.mockReset();
        mockEnd.mockReset();

        loggerMock = TypeMoq.Mock.ofType<ILogger>();
    });

    describe(toPoolConfig.name, () => {
        it('should use the connection string when one is given', () => {
            expect(toPoolConfig({ databaseUrl: 'postgres://localhost/ledger', databaseName: 'expense_ledger' }))
                .toEqual({ connectionString: 'postgres://localhost/ledger', max: 1 });
        });

        it('should fall back to the database name', () => {
            expect(toPoolConfig({ databaseName: 'expense_ledger' })).toEqual({ database: 'expense_ledger', max: 1 });
        });
    });

    describe('query', () => {
        it('should pass plain statements and default a missing row count to zero', async () => {
            const dbClient = createDbClient({ databaseName: 'expense_ledger' }, loggerMock.object);

            const result = await dbClient.query('SELECT 1');

            expect(result).toEqual({ rows: [{ text: 'SELECT 1' }], rowCount: 0 });
        });
    });

    describe('transaction', () => {
        it('should offer only the isolation level the stores use', () => {
            expect(Object.values(IsolationLevel)).toEqual(['REPEATABLE READ']);
        });

        it('should run the action between BEGIN with the isolation level and COMMIT', async () => {
            const dbClient = createDbClient({ databaseName: 'expense_ledger' }, loggerMock.object);

            const result = await dbClient.transaction(async (client: IDbClient) => {
                await client.query({ text: 'SELECT 1', values: [] });
                return 'done';
            }, IsolationLevel.RepeatableRead);

            expect(result).toEqual('done');
            expect(mockStatements).toEqual(['BEGIN ISOLATION LEVEL REPEATABLE READ', 'SELECT 1', 'COMMIT']);
            expect(mockRelease).toHaveBeenCalledTimes(1);
            expect(mockRelease.mock.calls[0][0]).toBeUndefined();
        });

        it('should begin without an isolation level when none is given', async () => {
            const dbClient = createDbClient({ databaseName: 'expense_ledger' }, loggerMock.object);

            await dbClient.transaction(async () => undefined);

            expect(mockStatements).toEqual(['BEGIN', 'COMMIT']);
        });

        it('should roll back, release and rethrow when the action fails', async () => {
            const error = Error('action failed');
            mockFailures.set('SELECT boom', error);
            const dbClient = createDbClient({ databaseName: 'expense_ledger' }, loggerMock.object);

            await expect(dbClient.transaction(client => client.query('SELECT boom'), IsolationLevel.RepeatableRead))
                .rejects
                .toBe(error);

            expect(mockStatements).toEqual(['BEGIN ISOLATION LEVEL REPEATABLE READ', 'SELECT boom', 'ROLLBACK']);
            expect(mockRelease).toHaveBeenCalledTimes(1);
            expect(mockRelease.mock.calls[0][0]).toBeUndefined();
        });

        it('should keep the original error and discard the client when ROLLBACK fails', async () => {
            const error = Error('original failure');
            const rollbackError = Error('connection lost');
            mockFailures.set('SELECT boom', error);
            mockFailures.set('ROLLBACK', rollbackError);
            const dbClient = createDbClient({ databaseName: 'expense_ledger' }, loggerMock.object);

            await expect(dbClient.transaction(client => client.query('SELECT boom')))
                .rejects
                .toBe(error);

            expect(mockRelease).toHaveBeenCalledWith(rollbackError);
            loggerMock.verify(l => l.error(rollbackError, TypeMoq.It.isAny()), TypeMoq.Times.once());
        });

        it('should run nested transactions on the same client', async () => {
            const dbClient = createDbClient({ databaseName: 'expense_ledger' }, loggerMock.object);

            await dbClient.transaction(client => client.transaction(nested => nested.query('SELECT 2')));

            expect(mockStatements).toEqual(['BEGIN', 'SELECT 2', 'COMMIT']);
        });
    });

    describe('end', () => {
        it('should end the pool', async () => {
            const dbClient = createDbClient({ databaseName: 'expense_ledger' }, loggerMock.object);

            await dbClient.end();

            expect(mockEnd).toHaveBeenCalledTimes(1);
        });
    });
});
