export * as Ledger from './ledger';
