#!/usr/bin/env node
import { Command } from 'commander';
import { resolveConfig, type ConfigOverrides } from '../utils/config.js';
import { initLogger, getLogger, parseLogLevel } from '../utils/logger.js';
import { createHttpClient } from '../utils/http-client.js';
import { createPipeline } from '../pipeline/create-pipeline.js';
import { PaperQaDatabase } from '../storage/database.js';
import { loadSeedFile, seedDatabase } from '../storage/seed.js';
import { formatAskResult, EXIT_CODES } from './output.js';

const VERSION = '1.0.0';

interface CommonOptions {
    db?: string;
    logLevel?: string;
    jsonLogs?: boolean;
}

interface AskOptions extends CommonOptions {
    topK?: string;
    cache: boolean;
    timeout?: string;
    json: boolean;
}

function commonOverrides(opts: CommonOptions): ConfigOverrides {
    return {
        db: opts.db,
        logLevel: parseLogLevel(opts.logLevel),
        jsonLogs: opts.jsonLogs,
    };
}

const program = new Command();

program
    .name('paperask')
    .description('Answer questions about research papers with retrieval-augmented generation and a persistent answer cache.')
    .version(VERSION);

// ─── ASK command ──────────────────────────────────────────

program
    .command('ask')
    .description('Ask a question about a paper')
    .argument('<paper>', 'Paper id or arXiv id')
    .argument('<question...>', 'Question text')
    .option('--db <path>', 'Database path')
    .option('-k, --top-k <n>', 'Passages to retrieve')
    .option('--no-cache', 'Bypass the answer cache')
    .option('--timeout <ms>', 'Abort the request after this many milliseconds')
    .option('--json', 'Print the response as JSON', false)
    .option('--log-level <level>', 'Log level: debug | info | warn | error | silent')
    .option('--json-logs', 'Output JSON logs')
    .action(async (paper: string, questionWords: string[], opts: AskOptions) => {
        const config = await resolveConfig({
            ...commonOverrides(opts),
            retrieval: { topK: opts.topK ? parseInt(opts.topK, 10) : undefined },
            cache: { enabled: opts.cache ? undefined : false },
        });
        initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
        const logger = getLogger();

        const db = new PaperQaDatabase(config.db);
        try {
            const pipeline = createPipeline(config, db, createHttpClient({ version: VERSION }));
            const signal = opts.timeout ? AbortSignal.timeout(parseInt(opts.timeout, 10)) : undefined;

            const result = await pipeline.ask({ paperId: paper, question: questionWords.join(' ') }, { signal });
            const { text, exitCode } = formatAskResult(result, opts.json);

            console.log(text);
            process.exitCode = exitCode;
        } catch (error) {
            logger.error({ error }, 'Ask failed');
            process.exitCode = EXIT_CODES.failure;
        } finally {
            db.close();
        }
    });

// ─── SEED command ─────────────────────────────────────────

program
    .command('seed')
    .description('Add or update papers (and pre-embedded passages) from a JSON file')
    .requiredOption('-i, --input <file>', 'Seed file path')
    .option('--db <path>', 'Database path')
    .option('--log-level <level>', 'Log level: debug | info | warn | error | silent')
    .option('--json-logs', 'Output JSON logs')
    .action(async (opts: CommonOptions & { input: string }) => {
        const config = await resolveConfig(commonOverrides(opts));
        initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
        const logger = getLogger();

        let db: PaperQaDatabase | null = null;
        try {
            const papers = loadSeedFile(opts.input);
            db = new PaperQaDatabase(config.db);
            const counts = seedDatabase(db, papers);
            logger.info({ ...counts, db: config.db }, 'Seed complete');
        } catch (error) {
            logger.error({ error }, 'Seed failed');
            process.exitCode = EXIT_CODES.failure;
        } finally {
            db?.close();
        }
    });

// ─── INSPECT command ──────────────────────────────────────

program
    .command('inspect')
    .description('Show database and answer cache statistics')
    .requiredOption('-i, --input <dbPath>', 'Input database path')
    .option('--top <n>', 'Most reused answers to list', '5')
    .action((opts: { input: string; top: string }) => {
        try {
            const db = new PaperQaDatabase(opts.input);
            const stats = db.getStats();
            const top = db.getTopCacheEntries(parseInt(opts.top, 10));
            db.close();

            console.log('\n📊 paperask Database Statistics\n');
            console.log(`  Papers:         ${stats.papers}`);
            console.log(`  Passages:       ${stats.passages} (${stats.indexedPassages} embedded)`);
            console.log(`  Cached answers: ${stats.cacheEntries}`);
            console.log(`  Cache hits:     ${stats.cacheHits}`);
            console.log(`  Tokens saved:   ${stats.tokensSaved}`);

            if (top.length > 0 && stats.cacheHits > 0) {
                console.log('\n  Most reused answers:');
                for (const entry of top) {
                    if (entry.hit_count === 0) break;
                    console.log(`    ${entry.hit_count}× ${entry.question}`);
                }
            }

            console.log('');
        } catch (error) {
            console.error('Inspect failed:', error);
            process.exit(1);
        }
    });

try {
    await program.parseAsync();
} catch (error) {
    // Configuration problems surface here, before a command sets up its own handling
    getLogger().error({ error }, 'Command failed');
    process.exitCode = EXIT_CODES.failure;
}
