/**
 * Unconditional fatal error handlers for uncaught exceptions and
 * unhandled promise rejections. Registered at CLI startup, before the
 * terminal is taken over, so crashes are always visible whether or not
 * debug mode is on.
 */

import { appendFileSync, mkdirSync } from "node:fs";
import { dirname, join } from "node:path";
import { RESTORE_SCREEN } from "./session/loop.js";

/** Guard against recursive or duplicate fatal error handling. */
let handled = false;

/** Longest error message shown in the banner. */
const MAX_MESSAGE_LENGTH = 500;

/**
 * Append a timestamped crash entry to the crash log.
 *
 * @param crashLog - Path of the crash log
 * @param type - Error classification (e.g., "Uncaught exception")
 * @param error - The error that caused the crash
 */
function writeCrashLog(crashLog: string, type: string, error: Error): void {
	try {
		mkdirSync(dirname(crashLog), { recursive: true });
		const entry = [
			`[${new Date().toISOString()}] ${type}`,
			`Message: ${error.message}`,
			`Stack:\n${error.stack ?? "(no stack trace)"}`,
			"---\n",
		].join("\n");
		appendFileSync(crashLog, entry);
	} catch (err) {
		const reason = err instanceof Error ? err.message : String(err);
		process.stderr.write(`Could not write crash log ${crashLog}: ${reason}\n`);
	}
}

/**
 * Lines of the fatal banner.
 *
 * @param type - Human-readable error type
 * @param error - The fatal error
 * @param crashLog - Where the full entry was written
 */
export function formatFatalBanner(type: string, error: Error, crashLog: string): string[] {
	const message =
		error.message.length > MAX_MESSAGE_LENGTH
			? `${error.message.slice(0, MAX_MESSAGE_LENGTH)}…`
			: error.message;

	// First stack frame (file:line) for quick context
	const stackLine = error.stack
		?.split("\n")
		.find((l) => l.trimStart().startsWith("at "))
		?.trim();

	return [
		"",
		`\x1b[41;97m FATAL \x1b[0m \x1b[1;31m${type}\x1b[0m`,
		"",
		`  ${message}`,
		...(stackLine ? [`  \x1b[2m${stackLine}\x1b[0m`] : []),
		"",
		`  \x1b[2mCrash log: ${crashLog}\x1b[0m`,
		`  \x1b[2mRun with --debug for detailed logs\x1b[0m`,
		"",
	];
}

/**
 * Write the crash log, restore the screen, print the banner, schedule exit.
 *
 * @param crashLog - Path of the crash log
 * @param type - Human-readable error type
 * @param error - The fatal error
 */
function handleFatal(crashLog: string, type: string, error: Error): void {
	if (handled) return;
	handled = true;

	writeCrashLog(crashLog, type, error);
	if (process.stdout.isTTY) process.stdout.write(RESTORE_SCREEN);
	process.stderr.write(formatFatalBanner(type, error, crashLog).join("\n"));

	// Other listeners for the same event run before nextTick fires
	process.nextTick(() => process.exit(1));
}

/**
 * Register process-level handlers for uncaught exceptions and unhandled
 * promise rejections. Call once at CLI startup.
 *
 * @param home - Marquee home directory; the crash log lives there
 * @returns The crash log path
 */
export function registerFatalErrorHandlers(home: string): string {
	const crashLog = join(home, "crash.log");

	process.on("uncaughtException", (err: Error) => {
		handleFatal(crashLog, "Uncaught exception", err);
	});

	process.on("unhandledRejection", (reason: unknown) => {
		const err = reason instanceof Error ? reason : new Error(String(reason));
		handleFatal(crashLog, "Unhandled promise rejection", err);
	});

	return crashLog;
}
