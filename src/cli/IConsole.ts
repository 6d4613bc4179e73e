export interface IOutput {
    writeLine(line: string): void;
}

export interface IPrompt {
    /** @returns the raw answer typed by the user */
    ask(question: string): Promise<string>;
}
