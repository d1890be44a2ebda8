/**
 * Test utilities for marquee unit and integration tests.
 *
 * @module test-utils
 */

export { FakeChildProcess } from "./fake-child-process.js";
// Virtual terminal
export { plainLines, RecordingTerminal, stripAnsi } from "./virtual-terminal.js";
