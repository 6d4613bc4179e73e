#!/usr/bin/env node
import './aliases';

import * as sourceMapSupport from 'source-map-support';

import { Controller, createConsoleOutput, createReadlinePrompt } from '@cli';
import { createDbClient, createSchemaUnitOfWork } from '@data-access';
import { getEnv } from '@environment';
import { Ledger } from '@managers';
import { createLogger } from '@utils';

import { config } from './Config';

sourceMapSupport.install();

(async () => {
    const logger = createLogger();
    const env = getEnv();

    const dbClient = createDbClient({
        databaseUrl: env.databaseUrl,
        databaseName: env.databaseName || config.databaseName,
    }, logger);

    try {
        const schema = createSchemaUnitOfWork(dbClient, logger);
        await schema.initSchema();

        const controller = new Controller(
            Ledger.createManager(schema.expenses, logger),
            createConsoleOutput(),
            createReadlinePrompt(),
            logger,
        );

        await controller.run(process.argv.slice(2));
    } finally {
        await dbClient.end();
    }
})().catch(err => {
    createLogger().error(err instanceof Error ? err : Error(String(err)));
    process.exitCode = 1;
});
