import { isValidDate, MalformedInputError } from '@utils';

const AMOUNT_REGEX = /^\d+(\.\d{0,2})?$/;
const ID_REGEX = /^\d+$/;

// ids are SERIAL, anything above this can never match a row
const MAX_ID = 2147483647;

export interface INewExpenseInput {
    amount: string;
    memo: string;
    date?: string;
}

export const parseNewExpense = ([amount, memo, date]: string[]): INewExpenseInput => {
    if (!amount || !memo || !memo.trim()) {
        throw new MalformedInputError('You must provide an amount and memo.');
    }

    if (!AMOUNT_REGEX.test(amount)) {
        throw new MalformedInputError(`Invalid amount: ${amount}`, amount);
    }

    if (date !== undefined && !isValidDate(date)) {
        throw new MalformedInputError(`Invalid date: ${date}`, date);
    }

    return { amount, memo, date };
};

export const parseIds = (values: string[]): number[] => {
    if (values.length === 0) {
        throw new MalformedInputError('You must provide an id.');
    }

    return values.map(value => {
        if (!ID_REGEX.test(value) || +value > MAX_ID) {
            throw new MalformedInputError(`Invalid id: ${value}`, value);
        }

        return +value;
    });
};

export const parseSearchQuery = ([query]: string[]): string => {
    if (query === undefined) {
        throw new MalformedInputError('You must provide a search query.');
    }

    return query;
};

export const isConfirmation = (answer: string): boolean => answer.trim().toLowerCase() === 'y';
