#!/usr/bin/env node
// Main Entry Point - Crypto Feed Ingestor
// Parses feeds and flags, wires agents -> canonicalizer -> dispatcher -> sinks, runs until SIGINT/SIGTERM

import 'dotenv/config';

import { Command, CommanderError } from 'commander';
import logger, { setLogLevel } from './shared/logger';
import { ConfigInput, IngestorConfig, loadConfig } from './shared/config';
import { ConfigurationError, describeError } from './shared/errors';
import { EventKind, EXPERIMENTAL_KINDS } from './shared/types';
import { QuoteTables, buildQuoteTables } from './canonicalizer/symbols';
import { createAgents } from './market-ingester/agent-registry';
import { discoverBinanceQuotes } from './market-ingester/symbol-discovery';
import { IngestPipeline } from './pipeline/ingest-pipeline';
import { Sink } from './sinks/sink';
import { StdoutSink } from './sinks/stdout-sink';
import { FileSink } from './sinks/file-sink';
import { RedisSink } from './sinks/redis-sink';

const EXIT_OK = 0;
const EXIT_RUNTIME_ERROR = 1;
const EXIT_USAGE = 2;
const STATUS_INTERVAL_MS = 60 * 1000;

// Flag names camel-case to the event kind they toggle (--book-ticker -> bookTicker)
const KIND_FLAGS: Readonly<[EventKind, string, string]>[] = [
    ['l2Diff', '--l2-diff', 'stream incremental order-book diffs'],
    ['l2Snapshot', '--l2-snapshot', 'emit full order-book snapshots'],
    ['bookTicker', '--book-ticker', 'stream best bid/ask updates'],
    ['ticker24h', '--ticker-24h', 'stream rolling 24h tickers'],
    ['ohlcv', '--ohlcv', 'stream 1m candles'],
    ['indexPrice', '--index-price', 'stream index prices'],
    ['markPrice', '--mark-price', 'stream mark prices'],
    ['fundingRate', '--funding-rate', 'stream funding rates'],
    ['openInterest', '--open-interest', 'stream open interest'],
    ['onchainTransfer', '--onchain-transfer', 'stream ERC-20 transfers'],
    ['onchainBalance', '--onchain-balance', 'accept on-chain balance events'],
    ['topDexPool', '--top-dex-pool', 'accept top DEX pool events'],
    ['newsHeadline', '--news-headline', 'accept news headline events'],
    ['telemetry', '--telemetry', 'accept telemetry events'],
];

const CLI_KINDS: readonly EventKind[] = ['trade', ...KIND_FLAGS.map(([kind]) => kind)];

type CliOptions = Partial<Record<EventKind, boolean>> & {
    spreadThreshold?: string;
    stalenessMs?: string;
    debounceMs?: string;
    analytics?: boolean;
    stdout?: boolean;
    outputFile?: string;
    redisUrl?: string;
    redisChannel?: string;
    config?: string;
    logLevel?: string;
};

export function buildProgram(): Command {
    const program = new Command('crypto-feed-ingestor')
        .description('Stream normalized crypto market data from several venues as JSON lines')
        .version('1.0.0')
        .argument('<feeds...>', 'feeds as venue:symbolOrAll, e.g. binance:btcusdt coinbase:BTC-USD deribit:all')
        .option('--no-trade', 'disable trade events (on by default)');

    for (const [, flag, description] of KIND_FLAGS) {
        program.option(flag, description);
    }

    return program
        .option('--spread-threshold <value>', 'relative spread that triggers an event, fraction or percent (0.005, 0.5%)')
        .option('--staleness-ms <ms>', 'ignore venue quotes received longer ago than this')
        .option('--debounce-ms <ms>', 'minimum interval between spread events per symbol')
        .option('--no-analytics', 'disable cross-venue spread detection')
        .option('--output-file <path>', 'append JSON lines to this file')
        .option('--redis-url <url>', 'publish JSON lines to Redis')
        .option('--redis-channel <channel>', 'Redis channel for published lines')
        .option('--no-stdout', 'do not write JSON lines to stdout')
        .option('--config <path>', 'JSON file with supervisor, dispatcher, analytics and venue settings')
        .option('--log-level <level>', 'error, warn, info or debug')
        .addHelpText(
            'after',
            `\nExperimental kinds (${EXPERIMENTAL_KINDS.join(', ')}) are enabled through\n` +
                'ENABLE_OPTIONS_CHAIN, ENABLE_MEMPOOL, ENABLE_BRIDGE_FLOWS and ENABLE_MEV_SIGNALS.'
        )
        .exitOverride();
}

/** Parse process-style argv into config input. Throws CommanderError on bad usage. */
export function parseCommandLine(argv: readonly string[]): ConfigInput {
    const program = buildProgram();
    program.parse([...argv]);
    const opts = program.opts<CliOptions>();

    const kinds: Partial<Record<EventKind, boolean>> = {};
    for (const kind of CLI_KINDS) {
        const enabled = opts[kind];
        if (enabled !== undefined) kinds[kind] = enabled;
    }

    return {
        feeds: program.args,
        kinds,
        spreadThreshold: opts.spreadThreshold,
        stalenessMs: opts.stalenessMs,
        debounceMs: opts.debounceMs,
        analytics: opts.analytics,
        stdout: opts.stdout,
        outputFile: opts.outputFile,
        redisUrl: opts.redisUrl,
        redisChannel: opts.redisChannel,
        configFile: opts.config,
        logLevel: opts.logLevel,
    };
}

async function resolveQuotes(config: IngestorConfig): Promise<QuoteTables> {
    if (config.binanceQuotes) {
        return buildQuoteTables({ binance: config.binanceQuotes });
    }
    if (!config.feeds.some((feed) => feed.venue === 'binance')) {
        return buildQuoteTables();
    }

    try {
        const quotes = await discoverBinanceQuotes(config.venues.binanceRestUrl);
        logger.info(`[Main] Discovered ${quotes.length} Binance quote assets`);
        return buildQuoteTables({ binance: quotes });
    } catch (error) {
        logger.warn(`[Main] Binance quote discovery failed, using built-in table: ${describeError(error)}`);
        return buildQuoteTables();
    }
}

function createSinks(config: IngestorConfig): Sink[] {
    const sinks: Sink[] = [];
    if (config.sinks.stdout) sinks.push(new StdoutSink());
    if (config.sinks.filePath) sinks.push(new FileSink(config.sinks.filePath));
    if (config.sinks.redis) sinks.push(new RedisSink(config.sinks.redis));
    return sinks;
}

function waitForShutdownSignal(): Promise<NodeJS.Signals> {
    return new Promise((resolve) => {
        const onSignal = (signal: NodeJS.Signals) => {
            process.off('SIGINT', onSignal);
            process.off('SIGTERM', onSignal);
            resolve(signal);
        };
        process.on('SIGINT', onSignal);
        process.on('SIGTERM', onSignal);
    });
}

function logStatus(pipeline: IngestPipeline): void {
    const status = pipeline.getStatus();
    const agents = status.agents.map((agent) => `${agent.name}=${agent.state}`).join(' ');
    logger.info(`[Main] Agents: ${agents} | ingest queue ${status.ingestQueued} | dead letters ${status.deadLetters}`);
}

export async function main(argv: readonly string[] = process.argv): Promise<number> {
    let config: IngestorConfig;
    try {
        config = loadConfig(parseCommandLine(argv));
    } catch (error) {
        if (error instanceof CommanderError) {
            return error.exitCode === 0 ? EXIT_OK : EXIT_USAGE;
        }
        if (error instanceof ConfigurationError) {
            logger.error(`[Main] ${error.message}`);
            return EXIT_USAGE;
        }
        throw error;
    }

    setLogLevel(config.logLevel);

    let pipeline: IngestPipeline;
    try {
        const quotes = await resolveQuotes(config);
        const agents = await createAgents(config);
        if (agents.length === 0) {
            throw new ConfigurationError('no feed serves any of the enabled event kinds');
        }
        pipeline = new IngestPipeline({ config, agents, sinks: createSinks(config), quotes });
    } catch (error) {
        if (error instanceof ConfigurationError) {
            logger.error(`[Main] ${error.message}`);
            return EXIT_USAGE;
        }
        throw error;
    }

    logger.info(`[Main] Starting ${config.feeds.length} feed(s)`);
    pipeline.start();

    const statusTimer = setInterval(() => logStatus(pipeline), STATUS_INTERVAL_MS);
    statusTimer.unref();

    const signal = await waitForShutdownSignal();
    logger.info(`[Main] Received ${signal}, shutting down gracefully...`);
    clearInterval(statusTimer);

    // A second signal while draining forces the exit
    const forceExit = () => {
        logger.warn('[Main] Second signal received, exiting without draining');
        process.exit(EXIT_RUNTIME_ERROR);
    };
    process.once('SIGINT', forceExit);
    process.once('SIGTERM', forceExit);

    await pipeline.stop();
    logStatus(pipeline);
    logger.info('[Main] Shutdown complete');
    return EXIT_OK;
}

if (require.main === module) {
    main()
        .then((code) => process.exit(code))
        .catch((error) => {
            logger.error(`[Main] Fatal error: ${describeError(error)}`);
            process.exit(EXIT_RUNTIME_ERROR);
        });
}
