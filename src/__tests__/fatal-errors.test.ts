import { describe, expect, it } from "vitest";
import { formatFatalBanner } from "../fatal-errors.js";

describe("formatFatalBanner", () => {
	it("shows the type, message, first stack frame and crash log", () => {
		const error = new Error("boom");
		error.stack = "Error: boom\n    at explode (/srv/marquee/dist/cli.js:10:5)\n    at main";

		expect(formatFatalBanner("Uncaught exception", error, "/home/u/.marquee/crash.log")).toEqual([
			"",
			"\x1b[41;97m FATAL \x1b[0m \x1b[1;31mUncaught exception\x1b[0m",
			"",
			"  boom",
			"  \x1b[2mat explode (/srv/marquee/dist/cli.js:10:5)\x1b[0m",
			"",
			"  \x1b[2mCrash log: /home/u/.marquee/crash.log\x1b[0m",
			"  \x1b[2mRun with --debug for detailed logs\x1b[0m",
			"",
		]);
	});

	it("truncates long messages and omits a missing stack", () => {
		const error = new Error("x".repeat(600));
		error.stack = undefined;

		const lines = formatFatalBanner("Unhandled promise rejection", error, "/tmp/crash.log");
		expect(lines[3]).toBe(`  ${"x".repeat(500)}…`);
		expect(lines[4]).toBe("");
		expect(lines).toHaveLength(8);
	});
});
