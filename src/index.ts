/**
 * Marquee library entry.
 *
 * The CLI is one wiring of these parts. They can be driven directly, for
 * example to search without a terminal:
 *
 * ```typescript
 * import { createSearch, DEFAULT_BASE_URL } from "marquee";
 *
 * const search = createSearch({ baseUrl: DEFAULT_BASE_URL });
 * for (const result of await search("the matrix")) {
 *   console.log(result.title, result.subtitle);
 * }
 * ```
 */

// ── Browser ──────────────────────────────────────────────────────────────────

export {
	type BrowserLaunchResult,
	type CommandRunner,
	type LaunchCommand,
	launchCommands,
	type OpenBrowserOptions,
	openBrowser,
	runDetached,
} from "./browser.js";
// ── Configuration ────────────────────────────────────────────────────────────
export {
	APP_NAME,
	type ConfigOverrides,
	DEFAULT_BASE_URL,
	DEFAULT_TIMEOUT_MS,
	loadSettings,
	MARQUEE_VERSION,
	type MarqueeConfig,
	type MarqueeSettings,
	type ResolvedConfig,
	resolveConfig,
	resolveMarqueeHome,
} from "./config.js";
// ── Logging ──────────────────────────────────────────────────────────────────
export { createLogger, DebugLogger, type LogCategory, type Logger, silentLogger } from "./logger.js";
// ── Search ───────────────────────────────────────────────────────────────────
export { extractResults } from "./search/extractor.js";
export {
	buildSearchUrl,
	createSearch,
	decodeEnvelope,
	type FetchOptions,
	fetchResults,
	type SearchEnvelope,
	type SearchFn,
} from "./search/fetcher.js";
export {
	SearchError,
	type SearchErrorCode,
	type SearchResult,
	toSearchError,
} from "./search/types.js";
// ── Session ──────────────────────────────────────────────────────────────────
export { SessionLoop, type SessionLoopOptions, type TerminalSurface } from "./session/loop.js";
export type {
	FetchOutcome,
	PendingFetch,
	SessionEffect,
	SessionMessage,
} from "./session/messages.js";
export {
	createSession,
	type Mode,
	resultUrl,
	type Session,
	type SessionOptions,
	type Transition,
	update,
	type Viewport,
} from "./session/state.js";
// ── Rendering ────────────────────────────────────────────────────────────────
export { type RenderOptions, render } from "./ui/render.js";
export { resolveSpinner, type SpinnerPreset } from "./ui/spinner.js";
export { defaultTheme, plainTheme, type Theme, themeFor } from "./ui/theme.js";
