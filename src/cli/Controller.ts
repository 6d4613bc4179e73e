import { Ledger } from '@managers';
import { renderRowSet, renderTable } from '@presenter';
import { ILogger, MalformedInputError } from '@utils';

import { Command, USAGE } from './Command';
import { IOutput, IPrompt } from './IConsole';
import { isConfirmation, parseIds, parseNewExpense, parseSearchQuery } from './InputValidation';

export const CLEAR_CONFIRMATION = 'This will remove all expenses. Are you sure? (y/n)';

export class Controller {
    constructor(
        private readonly ledger: Ledger.IManager,
        private readonly output: IOutput,
        private readonly prompt: IPrompt,
        private readonly baseLogger: ILogger,
    ) {
    }

    async run(argv: string[]): Promise<void> {
        const [command, ...args] = argv;
        const logger = this.baseLogger.child({ command });

        logger.debug('Command started');

        try {
            switch (command) {
                case Command.Add:
                    await this.add(args);
                    break;
                case Command.List:
                    await this.list();
                    break;
                case Command.Search:
                    await this.search(args);
                    break;
                case Command.Delete:
                    await this.delete(args);
                    break;
                case Command.Clear:
                    await this.clear();
                    break;
                default:
                    this.writeLines(USAGE);
            }
        } catch (err) {
            if (!(err instanceof MalformedInputError)) {
                throw err;
            }

            logger.debug({ value: err.value }, 'Malformed input');
            this.output.writeLine(err.message);
            return;
        }

        logger.debug('Command completed');
    }

    private async add(args: string[]): Promise<void> {
        const { amount, memo, date } = parseNewExpense(args);

        const { error } = await this.ledger.addExpense(amount, memo, date);
        if (!error) {
            return;
        }

        switch (error.code) {
            case Ledger.LedgerErrorCode.ConstraintViolation:
                this.output.writeLine('Amount must be greater than zero.');
                break;
            case Ledger.LedgerErrorCode.InvalidInput:
                this.output.writeLine(`Could not add the expense: ${error.message}`);
                break;
        }
    }

    private async list(): Promise<void> {
        this.writeLines(renderRowSet(await this.ledger.listExpenses()));
    }

    private async search(args: string[]): Promise<void> {
        const query = parseSearchQuery(args);

        this.writeLines(renderRowSet(await this.ledger.searchExpenses(query)));
    }

    private async delete(args: string[]): Promise<void> {
        // every id is checked before anything is removed
        const ids = parseIds(args);

        for (const id of ids) {
            const deleted = await this.ledger.deleteExpense(id);
            if (deleted.error) {
                this.output.writeLine(deleted.error.message);
                continue;
            }

            this.output.writeLine('The following expense has been deleted:');
            this.writeLines(renderTable([deleted.result]));
        }
    }

    private async clear(): Promise<void> {
        const answer = await this.prompt.ask(CLEAR_CONFIRMATION);
        if (!isConfirmation(answer)) {
            return;
        }

        await this.ledger.clearExpenses();
        this.output.writeLine('All expenses have been deleted.');
    }

    private writeLines(lines: Iterable<string>): void {
        for (const line of lines) {
            this.output.writeLine(line);
        }
    }
}
