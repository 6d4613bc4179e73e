const CENTS = 100;
const B_CENTS = BigInt(CENTS);
const B_ZERO = BigInt(0);
const B_ONE = BigInt(1);

const DECIMAL_REGEX = /^(-?)(\d+)(?:\.(\d*))?$/;

/**
 * Converts a decimal string into whole cents, rounding half away from zero
 * the same way NUMERIC(p,2) does. No floating point is involved.
 */
export const amountToCents = (amount: string): bigint => {
    const match = DECIMAL_REGEX.exec(amount.trim());
    if (!match) {
        throw Error(`Not a decimal amount: ${amount}`);
    }

    const [, sign, whole, fraction = ''] = match;
    const digits = fraction.padEnd(3, '0');

    let cents = BigInt(whole) * B_CENTS + BigInt(digits.substring(0, 2));
    if (+digits[2] >= 5) {
        cents += B_ONE;
    }

    return sign === '-' ? -cents : cents;
};

export const centsToAmount = (cents: bigint): string => {
    const sign = cents < B_ZERO ? '-' : '';
    const abs = cents < B_ZERO ? -cents : cents;

    return `${sign}${abs / B_CENTS}.${(abs % B_CENTS).toString().padStart(2, '0')}`;
};

export const formatAmount = (amount: string): string => centsToAmount(amountToCents(amount));

export const sumAmounts = (...amounts: string[]): string =>
    centsToAmount(amounts.reduce((s, a) => s + amountToCents(a), B_ZERO));
