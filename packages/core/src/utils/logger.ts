export type LogLevel = "debug" | "info" | "warn" | "error";

type LogData = Record<string, unknown>;

interface LogRecord extends LogData {
	ts: string;
	level: LogLevel;
	module: string;
	event: string;
}

const LEVELS: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
};

const isLogLevel = (value: string): value is LogLevel => value in LEVELS;

export interface LogSettings {
	minLevel: LogLevel;
	/** Only these modules are emitted; null lets every module through */
	modules: ReadonlySet<string> | null;
	pretty: boolean;
	json: boolean;
}

/**
 * Resolve output settings from `LOG_LEVEL`, `LOG_MODULE`, `LOG_PRETTY` and
 * `LOG_JSON`. Pretty output is on by default under `NODE_ENV=development`;
 * JSON lines are written whenever pretty output is off.
 */
export const readLogSettings = (env: NodeJS.ProcessEnv): LogSettings => {
	const level = (env.LOG_LEVEL ?? "").trim().toLowerCase();
	const modules = (env.LOG_MODULE ?? "")
		.split(",")
		.map((value) => value.trim())
		.filter((value) => value.length > 0);
	const pretty = env.LOG_PRETTY === "true" || env.NODE_ENV === "development";
	return {
		minLevel: isLogLevel(level) ? level : "info",
		modules: modules.length ? new Set(modules) : null,
		pretty,
		json: env.LOG_JSON === "true" || !pretty,
	};
};

const settings = readLogSettings(process.env);

export const isLogEnabled = (
	level: LogLevel,
	moduleName: string,
	current: LogSettings = settings
): boolean =>
	LEVELS[level] >= LEVELS[current.minLevel] &&
	(current.modules === null || current.modules.has(moduleName));

const writeJson = (record: LogRecord): void => {
	try {
		console.log(JSON.stringify(sanitizeValue(record, new WeakSet())));
	} catch (error) {
		console.log(
			JSON.stringify({
				ts: record.ts,
				level: "error",
				module: "logger",
				event: "logging_error",
				error: error instanceof Error ? error.message : "serialization_failed",
			})
		);
	}
};

const emit = (
	level: LogLevel,
	moduleName: string,
	event: string,
	data: LogData = {}
): void => {
	if (!isLogEnabled(level, moduleName)) {
		return;
	}
	const record: LogRecord = {
		ts: new Date().toISOString(),
		...data,
		level,
		module: moduleName,
		event,
	};
	if (settings.pretty) {
		try {
			printPretty(record);
		} catch (error) {
			console.warn(`[logger] pretty-print failed: ${getMessage(error)}`);
		}
	}
	if (settings.json) {
		writeJson(record);
	}
};

const getMessage = (error: unknown): string =>
	error instanceof Error ? error.message : "unknown";

export interface ModuleLogger {
	log: (level: LogLevel, event: string, data?: LogData) => void;
	debug: (event: string, data?: LogData) => void;
	info: (event: string, data?: LogData) => void;
	warn: (event: string, data?: LogData) => void;
	error: (event: string, data?: LogData) => void;
}

/** Structured JSON logger bound to one module name. */
export const createLogger = (moduleName: string): ModuleLogger => ({
	log: (level, event, data) => emit(level, moduleName, event, data),
	debug: (event, data) => emit("debug", moduleName, event, data),
	info: (event, data) => emit("info", moduleName, event, data),
	warn: (event, data) => emit("warn", moduleName, event, data),
	error: (event, data) => emit("error", moduleName, event, data),
});

const sanitizeValue = (value: unknown, seen: WeakSet<object>): unknown => {
	if (typeof value === "bigint") {
		return value.toString();
	}
	if (typeof value === "number" && !Number.isFinite(value)) {
		return String(value);
	}
	if (typeof value === "function") {
		return "[function]";
	}
	if (value instanceof Error) {
		return { name: value.name, message: value.message, stack: value.stack };
	}
	if (value instanceof Date) {
		return value.toISOString();
	}
	if (Array.isArray(value)) {
		if (seen.has(value)) {
			return "[circular]";
		}
		seen.add(value);
		const arr = value.map((item) => sanitizeValue(item, seen));
		seen.delete(value);
		return arr;
	}
	if (value && typeof value === "object") {
		if (seen.has(value)) {
			return "[circular]";
		}
		seen.add(value);
		const clone: Record<string, unknown> = {};
		for (const [key, nested] of Object.entries(value)) {
			clone[key] = sanitizeValue(nested, seen);
		}
		seen.delete(value);
		return clone;
	}
	return value;
};

function printPretty(base: LogRecord): void {
	const { level, event, module, ts, ...rest } = base;
	console.log(`[${ts}] [${level.toUpperCase()}] ${module}:${event}`);

	switch (event) {
		case "sync_summary": {
			printSyncSummary(rest);
			break;
		}
		case "symbol_sync_completed":
		case "symbol_sync_failed": {
			printSymbolLine(rest);
			break;
		}
		default:
			break;
	}
}

const fmtValue = (value: unknown): string =>
	value === undefined || value === null ? "-" : String(value);

const printSyncSummary = (rest: Record<string, unknown>): void => {
	const { mode, successCount, errorCount, cancelledCount, reports } = rest;
	console.table([{ mode, successCount, errorCount, cancelledCount }]);
	if (Array.isArray(reports) && reports.length > 0) {
		console.table(reports);
	}
};

const printSymbolLine = (rest: Record<string, unknown>): void => {
	const { symbol, status, rowsWritten, firstDate, lastDate, code } = rest;
	console.log(
		[
			`${fmtValue(symbol)}`,
			`status=${fmtValue(status ?? code)}`,
			`rows=${fmtValue(rowsWritten)}`,
			`range=${fmtValue(firstDate)}..${fmtValue(lastDate)}`,
		].join(" | ")
	);
};
