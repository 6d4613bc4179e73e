import { ILogger } from '@utils';

import { IDbClient } from './db-client';
import { ISchemaUnitOfWork } from './ISchemaUnitOfWork';
import { PgSchemaUnitOfWork } from './PgSchemaUnitOfWork';

export * from './db-client';
export * from './ISchemaUnitOfWork';

export * as Expenses from './expenses';

export const createSchemaUnitOfWork = (dbClient: IDbClient, logger: ILogger): ISchemaUnitOfWork => {
    return new PgSchemaUnitOfWork(dbClient, logger);
};
