import { Pool } from "pg";
import {
	ConfigError,
	createLogger,
	getDefaultConfigDir,
	getDefaultEnvPath,
	getErrorMessage,
	loadEnvConfig,
	loadIndicatorConfig,
	type EnvConfig,
	type SqlClient,
} from "@indisync/core";
import {
	CcxtMarketDataClient,
	ExchangePriceSource,
	PostgresPriceSource,
	RetryingPriceSource,
	type PriceSource,
} from "@indisync/data";
import {
	PostgresIndicatorSink,
	PostgresSymbolUniverse,
	ensureIndicatorSchema,
} from "@indisync/persistence";
import {
	IndicatorSyncController,
	runIndicatorSync,
} from "@indisync/sync-engine";
import {
	CliUsageError,
	parseCliArgs,
	resolveCliCommand,
	syncModeFor,
	type CliCommand,
} from "./cliArgs";
import { resolveSymbols } from "./symbols";

const cliLogger = createLogger("indicators-cli");

export const USAGE = `Usage:
  indicators-cli --mode <single|update-all|recalculate-all> [options]

Options:
  --mode <mode>            single, update-all (incremental) or recalculate-all (required)
  --symbol <symbol>        Symbol to sync, e.g. RELIANCE.NS (required for single)
  --from-date <YYYY-MM-DD> Recompute from this date instead of the stored cursor
  --profile <name>         Indicator config profile (default: default)
  --configDir <path>       Config directory (default: <workspace>/config)
  --envPath <path>         Custom .env path
  --concurrency <n>        Symbols processed at once (default: SYNC_CONCURRENCY or 4)
  --help                   Show this message
`;

const createPriceSource = (env: EnvConfig, pool: SqlClient): PriceSource => {
	const inner: PriceSource =
		env.priceSource === "postgres"
			? new PostgresPriceSource({ pool, marketSuffixes: env.marketSuffixes })
			: new ExchangePriceSource({
					client: new CcxtMarketDataClient({ exchangeId: env.priceSource }),
					logger: createLogger("data:exchange"),
				});
	return new RetryingPriceSource(inner);
};

const parseCommand = (argv: string[]): CliCommand | null => {
	try {
		return resolveCliCommand(parseCliArgs(argv));
	} catch (error) {
		if (error instanceof CliUsageError) {
			console.error(error.message);
			console.error(USAGE);
			return null;
		}
		throw error;
	}
};

/**
 * Resolve the run from argv, sync every selected symbol and return the
 * process exit code.
 */
export const runCli = async (
	argv: string[],
	signal?: AbortSignal
): Promise<number> => {
	const parsed = parseCommand(argv);
	if (parsed === null) {
		return 1;
	}
	if (parsed.kind === "help") {
		console.log(USAGE);
		return 0;
	}

	const { command } = parsed;
	const env = loadEnvConfig(command.envPath ?? getDefaultEnvPath());
	const config = loadIndicatorConfig(
		command.configDir ?? getDefaultConfigDir(),
		command.profile
	);
	if (!env.databaseUrl) {
		throw new ConfigError("DATABASE_URL is required to store indicators");
	}

	const concurrency = command.concurrency ?? env.syncConcurrency;
	const pool = new Pool({ connectionString: env.databaseUrl, max: concurrency });
	pool.on("error", (error) => {
		cliLogger.error("pg_pool_error", { error: getErrorMessage(error) });
	});

	try {
		await ensureIndicatorSchema(pool);
		const controller = new IndicatorSyncController({
			source: createPriceSource(env, pool),
			sink: new PostgresIndicatorSink({ pool }),
			config,
			marketSuffixes: env.marketSuffixes,
		});
		const symbols = await resolveSymbols(
			command,
			new PostgresSymbolUniverse(pool),
			env.sourceSuffix
		);
		if (symbols.length === 0) {
			cliLogger.info("nothing_to_sync", { mode: command.mode });
			return 0;
		}

		const result = await runIndicatorSync(controller, symbols, {
			mode: syncModeFor(command.mode),
			concurrency,
			signal,
			fromDate: command.fromDate,
		});
		return result.errorCount > 0 || result.cancelledCount > 0 ? 1 : 0;
	} finally {
		await pool.end();
	}
};
