import moment from 'moment';

export const DATE_FORMAT = 'YYYY-MM-DD';

export const today = (): string => {
    return moment().format(DATE_FORMAT);
};

/** Strict YYYY-MM-DD calendar date, e.g. rejects 2024-02-30 */
export const isValidDate = (value: string): boolean => {
    return moment(value, DATE_FORMAT, true).isValid();
};
