export * from './CommonTypes';
export * from './db-contracts';

export namespace SCHEMA {
    export enum TABLE_NAMES {
        EXPENSES = 'expenses',
    }

    export enum CONSTRAINT_NAMES {
        POSITIVE_AMOUNT = 'positive_amount_check',
    }
}
