export interface IEnvironment {
    /** Full connection string, takes precedence over the PG* variables */
    databaseUrl?: string;

    /** PGDATABASE, when the caller picked a database explicitly */
    databaseName?: string;

    logLevel: string;
    logPretty: boolean;
}

class Environment implements IEnvironment {
    get databaseUrl(): string | undefined {
        return this.getOptionalEnvVariable('DATABASE_URL');
    }

    get databaseName(): string | undefined {
        return this.getOptionalEnvVariable('PGDATABASE');
    }

    get logLevel(): string {
        return this.getOptionalEnvVariable('LOG_LEVEL') || 'warn';
    }

    get logPretty(): boolean {
        return this.getOptionalEnvVariable('LOG_PRETTY') === 'true';
    }

    private getOptionalEnvVariable(varName: string): string | undefined {
        const value = process.env[varName];
        return value ? value : undefined;
    }
}

let env: IEnvironment;

export const getEnv = (): IEnvironment => {
    if (!env) {
        env = new Environment();
    }

    return env;
};
