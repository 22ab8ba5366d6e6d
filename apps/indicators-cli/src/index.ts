#!/usr/bin/env node

import process from "node:process";
import { createLogger, getErrorCode, getErrorMessage } from "@indisync/core";
import { runCli } from "./main";

const logger = createLogger("indicators-cli");
const abortController = new AbortController();

process.once("SIGINT", () => {
	logger.warn("sync_interrupted", { reason: "SIGINT" });
	abortController.abort();
});

runCli(process.argv.slice(2), abortController.signal)
	.then((exitCode) => {
		process.exitCode = exitCode;
	})
	.catch((error: unknown) => {
		logger.error("cli_failed", {
			code: getErrorCode(error),
			error: getErrorMessage(error),
		});
		process.exitCode = 1;
	});
