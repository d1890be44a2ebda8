/**
 * Structured diagnostic logger for debug mode.
 *
 * Emits JSONL to `<home>/debug.log`, or to stderr when MARQUEE_DEBUG is
 * "stderr". Nothing is ever written to stdout: the TUI owns it.
 *
 * Activation: `--debug` or a truthy MARQUEE_DEBUG env var.
 */

import { appendFileSync, mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";

/** Log entry categories that partition diagnostic output. */
export type LogCategory = "session" | "input" | "fetch" | "browser" | "error";

/** Single JSONL log entry written to the debug log. */
export interface LogEntry {
	ts: string;
	cat: LogCategory;
	evt: string;
	data: Record<string, unknown>;
}

/** Anything the session loop can log through. */
export interface Logger {
	log(cat: LogCategory, evt: string, data?: Record<string, unknown>): void;
}

/** Logger used when debug mode is off. */
export const silentLogger: Logger = {
	log() {},
};

/** Maximum string length for values in log data before truncation. */
const MAX_STRING_LENGTH = 500;

/**
 * Recursively truncates long string values in a payload value.
 *
 * @param value - Value to truncate
 * @returns Deep-cloned value with long strings shortened
 */
function truncateValue(value: unknown): unknown {
	if (typeof value === "string" && value.length > MAX_STRING_LENGTH) {
		return `${value.slice(0, MAX_STRING_LENGTH)}…[${value.length} chars]`;
	}

	if (Array.isArray(value)) {
		return value.map((item) => truncateValue(item));
	}

	if (value !== null && typeof value === "object") {
		const result: Record<string, unknown> = {};
		for (const [key, nestedValue] of Object.entries(value)) {
			result[key] = truncateValue(nestedValue);
		}
		return result;
	}

	return value;
}

/**
 * Truncates string values in a payload, recursing into objects and arrays.
 *
 * @param data - Payload whose string values may need truncation
 */
export function truncateData(data: Record<string, unknown>): Record<string, unknown> {
	const result: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(data)) {
		result[key] = truncateValue(value);
	}
	return result;
}

/**
 * JSONL logger bound to a single destination.
 *
 * Uses synchronous appends; entries are rare (one per user action or fetch)
 * and must survive a crash right after they are written.
 */
export class DebugLogger implements Logger {
	private useStderr: boolean;
	private closed = false;
	readonly logPath: string;

	/**
	 * @param logDir - Directory for debug.log (the marquee home)
	 * @param toStderr - Write to stderr instead of the file
	 */
	constructor(logDir: string, toStderr = false) {
		this.useStderr = toStderr;
		this.logPath = join(logDir, "debug.log");

		if (!this.useStderr) {
			mkdirSync(logDir, { recursive: true });
			writeFileSync(this.logPath, "", { flag: "a" });
		}

		this.log("session", "log_start", { pid: process.pid, cwd: process.cwd() });
	}

	/**
	 * Write one entry.
	 *
	 * @param cat - Log category
	 * @param evt - Event name within the category
	 * @param data - Payload; long strings are truncated
	 */
	log(cat: LogCategory, evt: string, data: Record<string, unknown> = {}): void {
		if (this.closed) return;

		const entry: LogEntry = {
			ts: new Date().toISOString(),
			cat,
			evt,
			data: truncateData(data),
		};
		const line = `${JSON.stringify(entry)}\n`;

		if (this.useStderr) {
			process.stderr.write(line);
		} else {
			appendFileSync(this.logPath, line);
		}
	}

	/** Subsequent log() calls become no-ops. */
	close(): void {
		this.closed = true;
	}
}

/**
 * Create the logger for this run.
 *
 * @param home - Marquee home directory
 * @param debug - Whether debug mode is active
 * @param env - Environment, consulted for MARQUEE_DEBUG=stderr
 * @returns A file/stderr logger in debug mode, otherwise {@link silentLogger}
 */
export function createLogger(
	home: string,
	debug: boolean,
	env: NodeJS.ProcessEnv = process.env
): Logger & { close?(): void } {
	if (!debug) return silentLogger;
	return new DebugLogger(home, env.MARQUEE_DEBUG === "stderr");
}
