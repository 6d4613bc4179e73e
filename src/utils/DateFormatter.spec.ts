import { isValidDate, today } from './DateFormatter';

describe('Date Formatter', () => {
    describe(isValidDate.name, () => {
        it('should accept a leap day', () => {
            expect(isValidDate('2024-02-29')).toEqual(true);
        });

        it('should reject a leap day in a common year', () => {
            expect(isValidDate('2023-02-29')).toEqual(false);
        });

        it('should reject month 13', () => {
            expect(isValidDate('2024-13-01')).toEqual(false);
        });

        it('should reject single digit month and day', () => {
            expect(isValidDate('2024-1-5')).toEqual(false);
        });

        it('should reject free text', () => {
            expect(isValidDate('yesterday')).toEqual(false);
        });
    });

    describe(today.name, () => {
        it('should return a valid YYYY-MM-DD date', () => {
            const result = today();

            expect(result).toMatch(/^\d{4}-\d{2}-\d{2}$/);
            expect(isValidDate(result)).toEqual(true);
        });
    });
});
