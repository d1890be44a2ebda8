#!/usr/bin/env node

/**
 * Marquee CLI: search a title catalogue from the terminal and open the
 * pick in the browser.
 *
 * Usage:
 *   marquee                        Start with an empty search field
 *   marquee the matrix             Search for "the matrix" right away
 *   marquee --base-url <url>       Use another site root
 *   marquee --debug                Write JSONL diagnostics to ~/.marquee/debug.log
 */

import { ProcessTerminal } from "@mariozechner/pi-tui";
import { Command, InvalidArgumentError } from "commander";
import { openBrowser } from "./browser.js";
import {
	APP_NAME,
	MARQUEE_VERSION,
	type MarqueeConfig,
	parsePositiveInt,
	QUERY_CHAR_LIMIT,
	resolveConfig,
	resolveMarqueeHome,
} from "./config.js";
import { registerFatalErrorHandlers } from "./fatal-errors.js";
import { createLogger } from "./logger.js";
import { registerProcessCleanup } from "./process-cleanup.js";
import { createSearch } from "./search/fetcher.js";
import { SessionLoop } from "./session/loop.js";
import { createSession } from "./session/state.js";
import { FALLBACK_SPINNER, resolveSpinner } from "./ui/spinner.js";
import { themeFor } from "./ui/theme.js";

// ─── CLI ─────────────────────────────────────────────────────────────────────

/** Parsed top-level options. */
interface CliOptions {
	baseUrl?: string;
	timeout?: number;
	spinner?: string;
	color: boolean;
	debug?: boolean;
	home?: string;
}

/**
 * Commander argument parser for `--timeout`.
 *
 * @param value - Raw flag value
 * @returns Timeout in milliseconds
 * @throws {InvalidArgumentError} When not a positive integer
 */
function parseTimeout(value: string): number {
	const ms = parsePositiveInt(value);
	if (ms === undefined) {
		throw new InvalidArgumentError("Must be a positive integer (milliseconds).");
	}
	return ms;
}

const program: Command = new Command();

program
	.name(APP_NAME)
	.description("Search titles from your terminal and open the pick in your browser.")
	.version(MARQUEE_VERSION)
	.argument("[query...]", "Search right away for these words")
	.option("--base-url <url>", "Site root to search (default: https://movhub.ws)")
	.option("--timeout <ms>", "Request timeout in milliseconds", parseTimeout)
	.option("--spinner <name>", "cli-spinners preset for the loading screen")
	.option("--no-color", "Disable colors")
	.option("--debug", "Enable debug diagnostic logging")
	.option("--home <dir>", "Marquee home directory (settings, logs)")
	.action(run);

await program.parseAsync();

// ─── Main ────────────────────────────────────────────────────────────────────

/**
 * Run one interactive session and exit with its code.
 *
 * @param words - Positional query words
 * @param opts - Parsed options
 */
async function run(words: string[], opts: CliOptions): Promise<void> {
	const env = opts.home ? { ...process.env, MARQUEE_HOME: opts.home } : process.env;

	// Crashes are always visible, independent of debug mode
	registerFatalErrorHandlers(resolveMarqueeHome(env));

	let config: MarqueeConfig;
	try {
		const resolved = resolveConfig(
			{
				baseUrl: opts.baseUrl,
				timeoutMs: opts.timeout,
				spinner: opts.spinner,
				color: opts.color === false ? false : undefined,
				debug: opts.debug,
			},
			env
		);
		config = resolved.config;
		for (const warning of resolved.warnings) {
			process.stderr.write(`${APP_NAME}: ${warning}\n`);
		}
	} catch (err) {
		program.error(err instanceof Error ? err.message : String(err));
	}

	if (!process.stdin.isTTY || !process.stdout.isTTY) {
		process.stderr.write(`${APP_NAME}: an interactive terminal is required\n`);
		process.exit(1);
	}

	let spinner = resolveSpinner(config.spinner);
	if (!spinner) {
		process.stderr.write(`${APP_NAME}: unknown spinner "${config.spinner}", using "line"\n`);
		spinner = FALLBACK_SPINNER;
	}

	// Signal + EIO/EPIPE handlers restore the terminal on abnormal exit
	const cleanupRef = registerProcessCleanup();
	const logger = createLogger(config.home, config.debug, env);
	const query = [...words.join(" ").trim()].slice(0, QUERY_CHAR_LIMIT).join("");

	const loop = new SessionLoop({
		terminal: new ProcessTerminal(),
		session: createSession({ baseUrl: config.baseUrl, initialQuery: query }),
		search: createSearch({ baseUrl: config.baseUrl, timeoutMs: config.timeoutMs }),
		openUrl: (url) => openBrowser(url),
		render: { theme: themeFor(config.color), spinner },
		logger,
		submitOnStart: query.length > 0,
	});
	cleanupRef.current = () => loop.stop(1);

	let code: number;
	try {
		code = await loop.run();
	} catch (err) {
		const message = err instanceof Error ? err.message : String(err);
		logger.log("error", "terminal_start", { message });
		process.stderr.write(`${APP_NAME}: could not start the terminal: ${message}\n`);
		code = 1;
	}

	logger.close?.();
	process.exit(code);
}
