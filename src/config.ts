import { readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { type Static, Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

// ─── Identity ────────────────────────────────────────────────────────────────

export const APP_NAME = "marquee";
export const MARQUEE_VERSION = "0.3.0";
export const CONFIG_DIR = ".marquee";

// ─── Upstream endpoint ───────────────────────────────────────────────────────

/** Site root. Search requests and result links are both resolved against it. */
export const DEFAULT_BASE_URL = "https://movhub.ws";

/** AJAX search route, answered with a JSON envelope wrapping an HTML fragment. */
export const SEARCH_PATH = "/ajax/film/search";

/** Name of the query-string parameter carrying the search text. */
export const SEARCH_PARAM = "keyword";

/** Hard ceiling for a single search request. */
export const DEFAULT_TIMEOUT_MS = 10_000;

/**
 * The upstream only answers with JSON when the request looks like an XHR
 * from a desktop browser; anything else gets an HTML error page.
 */
export const SEARCH_HEADERS = {
	"User-Agent": "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36",
	"X-Requested-With": "XMLHttpRequest",
	Accept: "application/json, text/javascript, */*; q=0.01",
} as const;

// ─── UI defaults ─────────────────────────────────────────────────────────────

/** cli-spinners preset used for the Waiting screen. */
export const DEFAULT_SPINNER = "line";

/** Maximum length of the search field. */
export const QUERY_CHAR_LIMIT = 100;

// ─── Paths ───────────────────────────────────────────────────────────────────

/**
 * Resolve the marquee home directory (settings, debug log, crash log).
 *
 * @param env - Environment to read the MARQUEE_HOME override from
 * @returns Absolute path, ~/.marquee unless overridden
 */
export function resolveMarqueeHome(env: NodeJS.ProcessEnv = process.env): string {
	// Env override for CI, containers, and test isolation
	if (env.MARQUEE_HOME) return env.MARQUEE_HOME;
	return join(homedir(), CONFIG_DIR);
}

// ─── Settings file ───────────────────────────────────────────────────────────

const SettingsSchema = Type.Object({
	baseUrl: Type.Optional(Type.String({ minLength: 1 })),
	timeoutMs: Type.Optional(Type.Integer({ minimum: 1 })),
	spinner: Type.Optional(Type.String({ minLength: 1 })),
	color: Type.Optional(Type.Boolean()),
});

/** Contents of `<home>/settings.json`. Every key is optional. */
export type MarqueeSettings = Static<typeof SettingsSchema>;

/** Parsed settings plus a human-readable reason when the file was rejected. */
export interface SettingsLoadResult {
	settings: MarqueeSettings;
	warning?: string;
}

/**
 * Read and validate `settings.json` from the home directory.
 *
 * A missing file is not an error. A file that fails to parse or validate is
 * ignored as a whole and reported through `warning`.
 *
 * @param home - Marquee home directory
 */
export function loadSettings(home: string): SettingsLoadResult {
	const settingsPath = join(home, "settings.json");

	let raw: string;
	try {
		raw = readFileSync(settingsPath, "utf-8");
	} catch (err) {
		if (err instanceof Error && "code" in err && err.code === "ENOENT") return { settings: {} };
		const reason = err instanceof Error ? err.message : String(err);
		return { settings: {}, warning: `Ignoring ${settingsPath}: ${reason}` };
	}

	let parsed: unknown;
	try {
		parsed = JSON.parse(raw);
	} catch (err) {
		const reason = err instanceof Error ? err.message : String(err);
		return { settings: {}, warning: `Ignoring ${settingsPath}: ${reason}` };
	}

	if (!Value.Check(SettingsSchema, parsed)) {
		const first = Value.Errors(SettingsSchema, parsed).First();
		const reason = first ? `${first.path || "/"} ${first.message}` : "invalid settings";
		return { settings: {}, warning: `Ignoring ${settingsPath}: ${reason}` };
	}

	return { settings: parsed };
}

// ─── Value parsing ───────────────────────────────────────────────────────────

/**
 * Parse a strictly positive integer such as a timeout in milliseconds.
 *
 * @param raw - Text from a flag or environment variable
 * @returns The number, or undefined when `raw` is not a positive integer
 */
export function parsePositiveInt(raw: string): number | undefined {
	const trimmed = raw.trim();
	if (!/^\d+$/.test(trimmed)) return undefined;
	const value = Number(trimmed);
	return Number.isSafeInteger(value) && value > 0 ? value : undefined;
}

/**
 * Validate a base URL and drop trailing slashes so paths can be appended.
 *
 * @param raw - Candidate base URL
 * @returns Normalized URL without trailing slash
 * @throws {Error} When `raw` is not an absolute http(s) URL
 */
export function normalizeBaseUrl(raw: string): string {
	let url: URL;
	try {
		url = new URL(raw);
	} catch {
		throw new Error(`Invalid base URL: ${raw}`);
	}
	if (url.protocol !== "http:" && url.protocol !== "https:") {
		throw new Error(`Base URL must use http or https: ${raw}`);
	}
	return raw.replace(/\/+$/, "");
}

/**
 * Whether an environment flag is set to something truthy.
 *
 * @param value - Raw environment value
 */
export function isTruthyEnv(value: string | undefined): boolean {
	return Boolean(value) && value !== "0" && value !== "false";
}

// ─── Resolution ──────────────────────────────────────────────────────────────

/** Effective runtime configuration. */
export interface MarqueeConfig {
	home: string;
	baseUrl: string;
	timeoutMs: number;
	spinner: string;
	color: boolean;
	debug: boolean;
}

/** Values given on the command line; they win over env and settings. */
export interface ConfigOverrides {
	baseUrl?: string;
	timeoutMs?: number;
	spinner?: string;
	color?: boolean;
	debug?: boolean;
}

/** Resolved configuration plus any non-fatal problems found on the way. */
export interface ResolvedConfig {
	config: MarqueeConfig;
	warnings: string[];
}

/**
 * Build the effective configuration.
 *
 * Precedence, highest first: CLI overrides, environment
 * (MARQUEE_BASE_URL, MARQUEE_TIMEOUT_MS, NO_COLOR, MARQUEE_DEBUG),
 * settings.json, built-in defaults.
 *
 * @param overrides - Values parsed from CLI flags
 * @param env - Environment variables
 * @throws {Error} When the chosen base URL is not a valid http(s) URL
 */
export function resolveConfig(
	overrides: ConfigOverrides = {},
	env: NodeJS.ProcessEnv = process.env
): ResolvedConfig {
	const home = resolveMarqueeHome(env);
	const { settings, warning } = loadSettings(home);
	const warnings = warning ? [warning] : [];

	let envTimeout: number | undefined;
	if (env.MARQUEE_TIMEOUT_MS) {
		envTimeout = parsePositiveInt(env.MARQUEE_TIMEOUT_MS);
		if (envTimeout === undefined) {
			warnings.push(`Ignoring MARQUEE_TIMEOUT_MS=${env.MARQUEE_TIMEOUT_MS}: not a positive integer`);
		}
	}

	const envColor = env.NO_COLOR ? false : undefined;

	return {
		config: {
			home,
			baseUrl: normalizeBaseUrl(
				overrides.baseUrl ?? env.MARQUEE_BASE_URL ?? settings.baseUrl ?? DEFAULT_BASE_URL
			),
			timeoutMs: overrides.timeoutMs ?? envTimeout ?? settings.timeoutMs ?? DEFAULT_TIMEOUT_MS,
			spinner: overrides.spinner ?? settings.spinner ?? DEFAULT_SPINNER,
			color: overrides.color ?? envColor ?? settings.color ?? true,
			debug: overrides.debug === true || isTruthyEnv(env.MARQUEE_DEBUG),
		},
		warnings,
	};
}
