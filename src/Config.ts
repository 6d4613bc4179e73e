import * as fs from 'fs';

export interface IConfig {
    serviceName: string;
    databaseName: string;
}

const serviceConfigPath = process.env.CONFIG_PATH ? `${process.env.CONFIG_PATH}/expense-ledger-config.json` : undefined;

const readServiceConfig = (): Partial<IConfig> => {
    if (!serviceConfigPath || !fs.existsSync(serviceConfigPath)) {
        return {};
    }

    return JSON.parse(fs.readFileSync(serviceConfigPath, 'utf8'));
};

export const config: IConfig = {
    serviceName: 'Expense Ledger',
    databaseName: 'expense_ledger',
    ...readServiceConfig(),
};
