#!/usr/bin/env node
import { config as loadDotenv } from 'dotenv';
import { loadAppConfig } from '../../../libs/config/appConfig.js';
import { DotenvFileStore } from '../../../libs/config/configStore.js';
import { logger } from '../../../libs/logging/logger.js';
import { csvRowSource } from '../../../libs/records/rowSource.js';
import { createProgram, formatSummary, logSummary, runOperation } from './cli.js';

async function main(argv: string[]): Promise<void> {
    const program = createProgram(async (args) => {
        // Credentials are rewritten in this file as they are renewed.
        loadDotenv({ path: args.envFile });
        const config = loadAppConfig(process.env);

        const summary = await runOperation(args, {
            config,
            store: new DotenvFileStore(args.envFile),
            rows: csvRowSource(args.inputFile)
        });

        logSummary(summary);
        process.stdout.write(`${formatSummary(summary)}\n`);
        if (summary.haltedBy !== undefined) {
            process.exitCode = 1;
        }
    });

    await program.parseAsync(argv);
}

main(process.argv).catch((err: unknown) => {
    logger.fatal({ err }, 'worldcat-batch failed');
    process.exit(1);
});
