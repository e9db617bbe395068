import path from 'node:path';
import { Command, Option } from 'commander';
import { z } from 'zod';
import { TokenLifecycleManager } from '../../../libs/auth/tokenLifecycleManager.js';
import type { AppConfig } from '../../../libs/config/appConfig.js';
import type { ConfigStore } from '../../../libs/config/configStore.js';
import { ValidationError } from '../../../libs/errors/errors.js';
import type { HttpTransport } from '../../../libs/http/transport.js';
import { getComponentLogger, setLogLevel } from '../../../libs/logging/logger.js';
import type { RowSource } from '../../../libs/records/rowSource.js';
import type { CsvFileSink } from '../../../libs/records/sink.js';
import { withCsvSinks } from '../../../libs/records/sink.js';
import type { RunSummary } from '../../../libs/batch/batchDriver.js';
import {
    OUTPUT_FILES,
    getCurrentNumber,
    search,
    setHolding,
    unsetHolding
} from '../../../libs/batch/operations.js';
import { BulkRequestDispatcher } from '../../../libs/worldcat/bulkRequestDispatcher.js';

const logger = getComponentLogger('batch-cli');

export const CliArgumentsSchema = z.object({
    operation: z.enum(['get_current_number', 'set_holding', 'unset_holding', 'search']),
    inputFile: z.string().min(1),
    cascade: z.enum(['0', '1']).transform((value) => (value === '1' ? 1 : 0)),
    searchHeldByFirst: z.boolean(),
    outputDir: z.string().min(1),
    envFile: z.string().min(1)
});

export type CliArguments = z.infer<typeof CliArgumentsSchema>;

/**
 * Command-line surface. `run` receives validated arguments.
 */
export function createProgram(run: (args: CliArguments) => Promise<void>): Command {
    return new Command()
        .name('worldcat-batch')
        .description('Batch WorldCat Metadata API operations over a CSV file of records')
        .argument('<operation>', 'get_current_number | set_holding | unset_holding | search')
        .argument('<input-file>', 'CSV file with a header row')
        .addOption(
            new Option('--cascade <value>', 'unset_holding only: 0 aborts if local holdings exist, 1 removes them')
                .choices(['0', '1'])
                .default('0')
        )
        .option('--search-held-by-first', "search only: search the institution's holdings before all of WorldCat", false)
        .option('--output-dir <dir>', 'directory for the output CSV files', 'outputs')
        .option('--env-file <path>', 'dotenv file holding configuration and credentials', '.env')
        .action(async (operation: string, inputFile: string, options: Record<string, unknown>) => {
            const parsed = CliArgumentsSchema.safeParse({ operation, inputFile, ...options });
            if (!parsed.success) {
                throw new ValidationError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; '));
            }
            await run(parsed.data);
        });
}

export interface RunDependencies {
    config: AppConfig;
    store: ConfigStore;
    rows: RowSource;
    transport?: HttpTransport;
}

/**
 * Wire up the pipeline for one operation and write its outputs under
 * `args.outputDir`.
 */
export async function runOperation(args: CliArguments, deps: RunDependencies): Promise<RunSummary<string>> {
    setLogLevel(deps.config.logLevel);
    const tokens = new TokenLifecycleManager({ config: deps.config, store: deps.store, transport: deps.transport });
    const dispatcher = new BulkRequestDispatcher({ config: deps.config, tokens, transport: deps.transport });
    const outputDir = path.join(args.outputDir, args.operation);
    const maxRecordsPerRequest = deps.config.maxRecordsPerRequest;

    return withCsvSinks(async (open): Promise<RunSummary<string>> => {
        const file = (name: string): CsvFileSink => open(path.join(outputDir, name));

        switch (args.operation) {
            case 'get_current_number':
                return getCurrentNumber({
                    rows: deps.rows,
                    maxRecordsPerRequest,
                    dispatcher,
                    sinks: {
                        current: file(OUTPUT_FILES.get_current_number.current),
                        old: file(OUTPUT_FILES.get_current_number.old),
                        error: file(OUTPUT_FILES.get_current_number.error)
                    }
                });
            case 'set_holding':
                return setHolding({
                    rows: deps.rows,
                    maxRecordsPerRequest,
                    dispatcher,
                    sinks: {
                        updated: file(OUTPUT_FILES.set_holding.updated),
                        'no-update-needed': file(OUTPUT_FILES.set_holding['no-update-needed']),
                        error: file(OUTPUT_FILES.set_holding.error)
                    }
                });
            case 'unset_holding':
                return unsetHolding({
                    rows: deps.rows,
                    maxRecordsPerRequest,
                    dispatcher,
                    cascade: args.cascade,
                    sinks: {
                        updated: file(OUTPUT_FILES.unset_holding.updated),
                        'no-update-needed': file(OUTPUT_FILES.unset_holding['no-update-needed']),
                        error: file(OUTPUT_FILES.unset_holding.error)
                    }
                });
            case 'search':
                return search({
                    rows: deps.rows,
                    dispatcher,
                    institutionSymbol: deps.config.institutionSymbol,
                    heldByFirst: args.searchHeldByFirst,
                    sinks: {
                        found: file(OUTPUT_FILES.search.found),
                        'zero-or-multiple': file(OUTPUT_FILES.search['zero-or-multiple']),
                        error: file(OUTPUT_FILES.search.error)
                    }
                });
        }
    });
}

export function formatSummary(summary: RunSummary<string>): string {
    const lines = [`Processed ${summary.totalRows} rows from input file (${summary.operation}):`];
    for (const [category, count] of Object.entries(summary.counters)) {
        lines.push(`- ${count} record(s) ${category}`);
    }
    if (summary.notProcessed > 0) {
        lines.push(`- ${summary.notProcessed} record(s) not processed`);
    }
    lines.push(`API requests made: ${summary.apiRequests}`);
    if (summary.searchStats !== undefined) {
        lines.push(
            `- ${summary.searchStats.recordsNeedingOneRequest} record(s) needed one API request`,
            `- ${summary.searchStats.recordsNeedingTwoRequests} record(s) needed two API requests`
        );
    }
    if (summary.haltedBy !== undefined) {
        lines.push(`Run halted: ${summary.haltedBy.message}`);
    }
    return lines.join('\n');
}

export function logSummary(summary: RunSummary<string>): void {
    logger.info({ event: 'RUN_SUMMARY', ...summary }, formatSummary(summary));
}
