import { EventEmitter } from "node:events";

/**
 * Spawn-compatible fake for detached child processes.
 *
 * Nothing happens until the test calls {@link emitSpawn} or
 * {@link emitError}, matching how Node reports a launch.
 */
export class FakeChildProcess extends EventEmitter {
	unrefCalled = false;

	/**
	 * Compatibility no-op matching Node child process API.
	 *
	 * @returns This instance
	 */
	unref(): this {
		this.unrefCalled = true;
		return this;
	}

	/** Report a successful launch. */
	emitSpawn(): void {
		this.emit("spawn");
	}

	/**
	 * Emit an error event with a normalized Error value.
	 *
	 * @param error - Error-like value to emit
	 */
	emitError(error: unknown): void {
		const normalized =
			error instanceof Error ? error : new Error(typeof error === "string" ? error : String(error));
		this.emit("error", normalized);
	}
}
