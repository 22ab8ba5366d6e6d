import {
	IndisyncError,
	isIsoDate,
	type IsoDate,
	type SyncMode,
} from "@indisync/core";

export type ArgValue = string | boolean;

export class CliUsageError extends IndisyncError {
	readonly code = "CLI_USAGE" as const;
}

export const RUN_MODES = ["single", "update-all", "recalculate-all"] as const;
export type RunMode = (typeof RUN_MODES)[number];

const RUN_MODE_SET: ReadonlySet<string> = new Set(RUN_MODES);

const isRunMode = (value: string): value is RunMode =>
	RUN_MODE_SET.has(value);

export interface SyncCommand {
	mode: RunMode;
	symbol?: string;
	fromDate?: IsoDate;
	profile: string;
	configDir?: string;
	envPath?: string;
	concurrency?: number;
}

export type CliCommand = { kind: "help" } | { kind: "sync"; command: SyncCommand };

export const parseCliArgs = (argv: string[]): Record<string, ArgValue> => {
	const args: Record<string, ArgValue> = {};
	for (let i = 0; i < argv.length; i++) {
		const token = argv[i];
		if (!token.startsWith("--")) {
			throw new CliUsageError(`Unexpected argument "${token}"`);
		}
		const eqIdx = token.indexOf("=");
		if (eqIdx !== -1) {
			args[token.slice(2, eqIdx)] = token.slice(eqIdx + 1);
			continue;
		}
		const key = token.slice(2);
		const next = argv[i + 1];
		if (next && !next.startsWith("--")) {
			args[key] = next;
			i += 1;
		} else {
			args[key] = true;
		}
	}
	return args;
};

const readString = (
	args: Record<string, ArgValue>,
	key: string
): string | undefined => {
	const value = args[key];
	if (value === undefined) {
		return undefined;
	}
	if (typeof value !== "string" || value.trim().length === 0) {
		throw new CliUsageError(`--${key} requires a value`);
	}
	return value.trim();
};

const readPositiveInt = (
	args: Record<string, ArgValue>,
	key: string
): number | undefined => {
	const raw = readString(args, key);
	if (raw === undefined) {
		return undefined;
	}
	const value = Number(raw);
	if (!Number.isInteger(value) || value < 1) {
		throw new CliUsageError(`--${key} must be a positive integer, got "${raw}"`);
	}
	return value;
};

export const resolveCliCommand = (args: Record<string, ArgValue>): CliCommand => {
	if (args.help) {
		return { kind: "help" };
	}

	const mode = readString(args, "mode");
	if (mode === undefined || !isRunMode(mode)) {
		throw new CliUsageError(`--mode must be one of ${RUN_MODES.join(", ")}`);
	}

	const symbol = readString(args, "symbol");
	if (mode === "single" && symbol === undefined) {
		throw new CliUsageError("--symbol is required in single mode");
	}

	const fromDate = readString(args, "from-date");
	if (fromDate !== undefined && !isIsoDate(fromDate)) {
		throw new CliUsageError(
			`Invalid --from-date "${fromDate}". Expected format like "2025-01-31"`
		);
	}

	return {
		kind: "sync",
		command: {
			mode,
			symbol,
			fromDate,
			profile: readString(args, "profile") ?? "default",
			configDir: readString(args, "configDir"),
			envPath: readString(args, "envPath"),
			concurrency: readPositiveInt(args, "concurrency"),
		},
	};
};

export const syncModeFor = (mode: RunMode): SyncMode =>
	mode === "recalculate-all" ? "full_recalculate" : "incremental";
