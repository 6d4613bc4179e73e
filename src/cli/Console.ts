import * as readline from 'readline';

import { IOutput, IPrompt } from './IConsole';

export const createConsoleOutput = (stream: NodeJS.WritableStream = process.stdout): IOutput => ({
    writeLine: (line: string) => {
        stream.write(`${line}\n`);
    },
});

const openStdioInterface = () => readline.createInterface({ input: process.stdin, output: process.stdout });

export const createReadlinePrompt = (openInterface: () => readline.Interface = openStdioInterface): IPrompt => ({
    ask: async (question: string) => {
        const rl = openInterface();

        try {
            return await new Promise<string>(resolve => {
                // end of input and Ctrl+C both count as no answer
                rl.once('close', () => resolve(''));
                rl.once('SIGINT', () => rl.close());
                rl.question(`${question} `, answer => resolve(answer));
            });
        } finally {
            rl.close();
        }
    },
});
