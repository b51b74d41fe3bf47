#!/usr/bin/env node
import { Command, InvalidArgumentError, Option } from 'commander';
import path from 'path';
import { getConfig } from './config';
import { initializeSchema, openDatabase } from './db';
import { CsvFeed, StagingTableFeed } from './modules/feed';
import { createOracleHandle, requireOracle } from './modules/oracle';
import { UnificationWriter } from './modules/writer';
import { createPipelineContext, MatchingPipeline } from './pipeline';
import type { MatchingMode, SourceFeed } from './types';
import { Logger } from './utils/logger';

interface ResolveOptions {
    registry?: string;
    web?: string;
    maxReviews?: number;
    policy?: MatchingMode;
    dryRun?: boolean;
}

function parseNonNegativeInteger(value: string): number {
    const n = Number(value);
    if (!Number.isInteger(n) || n < 0) {
        throw new InvalidArgumentError('Expected a non-negative integer.');
    }
    return n;
}

const program = new Command();

program
    .name('company-matcher')
    .description('Links Australian business registry entities to company mentions found on the web')
    .version('1.0.0');

program
    .command('resolve')
    .description('Run one matching pass and replace the unified company tables')
    .option('-r, --registry <path>', 'Registry CSV export (defaults to the stg_abr_entities table)')
    .option('-w, --web <path>', 'Web mention CSV export (defaults to the stg_commoncrawl_companies table)')
    .option('-m, --max-reviews <n>', 'Maximum number of ambiguous matches sent to the oracle', parseNonNegativeInteger)
    .addOption(new Option('-p, --policy <mode>', 'Matching policy').choices(['thresholded', 'blanket-adjudicate']))
    .option('--dry-run', 'Match and review without writing to the database')
    .action(async (options: ResolveOptions) => {
        if (Boolean(options.registry) !== Boolean(options.web)) {
            throw new InvalidArgumentError('--registry and --web must be given together.');
        }

        const config = getConfig();
        const db = openDatabase(config.sqlitePath);
        try {
            initializeSchema(db);

            const feed: SourceFeed =
                options.registry && options.web
                    ? new CsvFeed(path.resolve(options.registry), path.resolve(options.web))
                    : new StagingTableFeed(db, config.sampling);

            const context = createPipelineContext(
                {
                    ...config,
                    matching: options.policy ? { ...config.matching, mode: options.policy } : config.matching,
                    oracle: { ...config.oracle, maxReviews: options.maxReviews ?? config.oracle.maxReviews },
                },
                { feed, writer: new UnificationWriter(db), dryRun: options.dryRun }
            );

            const summary = await MatchingPipeline.run(context);
            console.log(JSON.stringify(summary, null, 2));
        } finally {
            db.close();
        }
    });

program
    .command('init-db')
    .description('Create the staging and unified tables')
    .action(() => {
        const config = getConfig();
        const db = openDatabase(config.sqlitePath);
        try {
            initializeSchema(db);
            console.log(`Schema ready at ${config.sqlitePath}`);
        } finally {
            db.close();
        }
    });

program
    .command('stats')
    .description('Print unified company and source link counts')
    .action(() => {
        const config = getConfig();
        const db = openDatabase(config.sqlitePath);
        try {
            initializeSchema(db);
            const { unified, links } = new UnificationWriter(db).countRows();
            console.log(`company_unified: ${unified}`);
            console.log(`company_source_link: ${links}`);
        } finally {
            db.close();
        }
    });

program
    .command('ping-oracle')
    .description('Check that the oracle is configured and answering')
    .action(async () => {
        const config = getConfig();
        const judge = requireOracle(createOracleHandle(config.oracle));
        const response = await judge.judge('Respond ONLY with JSON.', 'Reply with {"ok": true}.');
        console.log(`Oracle (${config.oracle.model}) answered: ${response}`);
    });

program.parseAsync(process.argv).catch((error: unknown) => {
    Logger.logError('Fatal error', error);
    console.error('Fatal Error:', error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
});
