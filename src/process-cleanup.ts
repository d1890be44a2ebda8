/**
 * Process-level cleanup handlers for abnormal exits.
 *
 * Handles what the session loop's own quit path doesn't cover:
 * 1. SIGTERM / SIGINT sent from outside (raw mode turns ctrl+c into a key)
 * 2. EIO on stdout/stderr when the terminal disconnects
 * 3. EPIPE on stdout/stderr when the reader closes
 *
 * Each runs the registered restore hook so the terminal leaves the
 * alternate screen before the process exits.
 */

/** Mutable slot for the hook that gives the terminal back. */
export interface CleanupRef {
	current?: () => void;
}

/** Exit codes for the handled signals (128 + signal number). */
export const SIGNAL_EXIT_CODES = {
	SIGINT: 130,
	SIGTERM: 143,
} as const;

/** Guard against re-entrant cleanup (signal + EIO racing). */
let cleaning = false;

/**
 * Run the restore hook, then exit.
 *
 * @param ref - Holds the restore hook, if the terminal was taken over
 * @param exitCode - Process exit code
 */
function cleanup(ref: CleanupRef, exitCode: number): never {
	if (cleaning) {
		// Second signal means "exit now"
		process.exit(exitCode);
	}
	cleaning = true;

	try {
		ref.current?.();
	} catch (err) {
		const reason = err instanceof Error ? err.message : String(err);
		process.stderr.write(`Terminal restore failed: ${reason}\n`);
	}

	process.exit(exitCode);
}

/**
 * Exit on EIO/EPIPE from a writable stream. Without a handler the
 * process keeps running against a terminal that no longer exists.
 *
 * @param stream - stdout or stderr
 * @param ref - Restore hook slot
 */
function handleStreamError(stream: NodeJS.WriteStream, ref: CleanupRef): void {
	stream.on("error", (err: NodeJS.ErrnoException) => {
		if (err.code === "EIO" || err.code === "EPIPE") {
			cleanup(ref, 1);
		}
		// Anything else goes to the fatal error handler
		throw err;
	});
}

/**
 * Register handlers for signals and terminal I/O errors.
 *
 * Call once after argument parsing. Set `.current` on the returned ref
 * once the terminal has been taken over.
 *
 * @returns Restore hook slot
 */
export function registerProcessCleanup(): CleanupRef {
	const ref: CleanupRef = {};

	// ── Signals ──────────────────────────────────────────────────────────────
	process.on("SIGINT", () => cleanup(ref, SIGNAL_EXIT_CODES.SIGINT));
	process.on("SIGTERM", () => cleanup(ref, SIGNAL_EXIT_CODES.SIGTERM));

	// ── Terminal I/O errors ──────────────────────────────────────────────────
	handleStreamError(process.stdout, ref);
	handleStreamError(process.stderr, ref);

	return ref;
}
