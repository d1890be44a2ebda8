/**
 * Opens a URL with the operating system's default handler.
 *
 * Best effort: each platform has one or more candidate commands, tried in
 * order. A command counts as launched once the process has spawned; its
 * exit status is not awaited. When nothing launches, the URL is printed so
 * the user can open it by hand. Failure is never raised to the caller.
 */

import { spawn } from "node:child_process";

/** One way of opening a URL on a platform. */
export interface LaunchCommand {
	readonly command: string;
	readonly args: readonly string[];
}

/** What happened when opening a URL. */
export type BrowserLaunchResult =
	| { readonly opened: true; readonly command: string }
	| { readonly opened: false; readonly reason: string };

/** Starts a command without waiting for it to finish. */
export type CommandRunner = (command: string, args: readonly string[]) => Promise<void>;

/** Options for {@link openBrowser}. */
export interface OpenBrowserOptions {
	/** Platform to dispatch on (default: process.platform) */
	platform?: NodeJS.Platform;
	/** Command runner (default: {@link runDetached}) */
	run?: CommandRunner;
	/** Where the fallback line goes (default: stdout) */
	print?: (line: string) => void;
}

/**
 * Candidate commands for opening `url`, in the order to try them.
 *
 * @param platform - Node platform identifier
 * @param url - Absolute URL
 * @returns Empty for unsupported platforms
 */
export function launchCommands(platform: NodeJS.Platform, url: string): LaunchCommand[] {
	switch (platform) {
		case "linux":
			return [
				{ command: "xdg-open", args: [url] },
				// Termux and other Android shells have no xdg-open
				{
					command: "am",
					args: ["start", "--user", "0", "-a", "android.intent.action.VIEW", "-d", url],
				},
			];
		case "darwin":
			return [{ command: "open", args: [url] }];
		case "win32":
			return [{ command: "rundll32", args: ["url.dll,FileProtocolHandler", url] }];
		default:
			return [];
	}
}

/**
 * Spawn a detached process with no stdio and let it outlive us.
 *
 * @param command - Executable name
 * @param args - Arguments
 * @returns Resolves once the process has spawned
 * @throws {Error} When the executable cannot be started (e.g. ENOENT)
 */
export function runDetached(command: string, args: readonly string[]): Promise<void> {
	return new Promise((resolve, reject) => {
		const child = spawn(command, [...args], { detached: true, stdio: "ignore" });
		child.once("error", reject);
		child.once("spawn", () => {
			child.unref();
			resolve();
		});
	});
}

/**
 * Open `url` in the default browser, or print it when that is not possible.
 *
 * @param url - Absolute URL
 * @param options - Platform, runner and output overrides
 */
export async function openBrowser(
	url: string,
	options: OpenBrowserOptions = {}
): Promise<BrowserLaunchResult> {
	const platform = options.platform ?? process.platform;
	const run = options.run ?? runDetached;
	const print = options.print ?? ((line: string) => process.stdout.write(`${line}\n`));

	const commands = launchCommands(platform, url);
	let reason = `unsupported platform: ${platform}`;

	for (const { command, args } of commands) {
		try {
			await run(command, args);
			return { opened: true, command };
		} catch (err) {
			reason = `${command}: ${err instanceof Error ? err.message : String(err)}`;
		}
	}

	print(`Open in browser: ${url}`);
	return { opened: false, reason };
}
