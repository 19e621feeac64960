#!/usr/bin/env node
import { runCli } from "./lib/cli.js";
import { logError } from "./lib/logger.js";

runCli(process.argv.slice(2))
	.then((code) => {
		process.exitCode = code;
	})
	.catch((error: unknown) => {
		logError("Unexpected failure", error instanceof Error ? error.message : String(error));
		process.exitCode = 1;
	});
