import { Expenses } from '@data-access';
import { ILogger } from '@utils';

import { IManager } from './IManager';
import { Manager } from './Manager';

export * from './IManager';

export type IManagerFactory = (store: Expenses.IStore, logger: ILogger) => IManager;

export const createManager: IManagerFactory = (store: Expenses.IStore, logger: ILogger): IManager => {
    return new Manager(store, logger);
};
