import { IStore as IExpensesStore } from './expenses';

export interface ISchemaUnitOfWork {
    expenses: IExpensesStore;

    /** Creates the expenses table on first run, no-op when it already exists */
    initSchema(): Promise<void>;
}
