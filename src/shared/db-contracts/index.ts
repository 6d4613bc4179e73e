export * from './Expenses';
