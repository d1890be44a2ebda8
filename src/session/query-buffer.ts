/**
 * Single-line edit buffer for the search field.
 *
 * Immutable: every edit returns a new buffer. The cursor counts code points,
 * not UTF-16 units, so emoji and CJK text move as one character.
 */

import { Key, matchesKey } from "@mariozechner/pi-tui";

/** Text plus cursor position (0 = before the first character). */
export interface QueryBuffer {
	readonly text: string;
	readonly cursor: number;
}

/** An empty buffer. */
export const EMPTY_BUFFER: QueryBuffer = { text: "", cursor: 0 };

const BRACKETED_PASTE_START = "\x1b[200~";
const BRACKETED_PASTE_END = "\x1b[201~";

/**
 * Create a buffer holding `text` with the cursor at the end.
 *
 * @param text - Initial text
 */
export function bufferOf(text: string): QueryBuffer {
	return { text, cursor: [...text].length };
}

/**
 * Decode raw terminal input into text to insert, if it is text at all.
 *
 * Accepts typed characters and bracketed pastes (newlines in a paste become
 * spaces). Control characters and escape sequences are not text.
 *
 * @param data - Raw input from the terminal
 * @returns The text to insert, or undefined for keys that are not text
 */
export function decodeTextInput(data: string): string | undefined {
	if (data.startsWith(BRACKETED_PASTE_START)) {
		const body = data.slice(BRACKETED_PASTE_START.length).replace(BRACKETED_PASTE_END, "");
		const flattened = body.replace(/[\r\n\t]+/g, " ");
		// biome-ignore lint/suspicious/noControlCharactersInRegex: strip stray control bytes from pastes
		const text = flattened.replace(/[\x00-\x1f\x7f]/g, "");
		return text.length > 0 ? text : undefined;
	}
	// biome-ignore lint/suspicious/noControlCharactersInRegex: printable text has no control bytes
	if (data.length === 0 || /[\x00-\x1f\x7f]/.test(data)) return undefined;
	return data;
}

/**
 * Insert text at the cursor, dropping whatever would exceed `limit`.
 *
 * @param buffer - Current buffer
 * @param text - Text to insert
 * @param limit - Maximum length in code points
 */
export function insertText(buffer: QueryBuffer, text: string, limit: number): QueryBuffer {
	const chars = [...buffer.text];
	const room = Math.max(0, limit - chars.length);
	const inserted = [...text].slice(0, room);
	if (inserted.length === 0) return buffer;
	chars.splice(buffer.cursor, 0, ...inserted);
	return { text: chars.join(""), cursor: buffer.cursor + inserted.length };
}

/**
 * Delete the character before the cursor.
 *
 * @param buffer - Current buffer
 */
export function deleteBackward(buffer: QueryBuffer): QueryBuffer {
	if (buffer.cursor === 0) return buffer;
	const chars = [...buffer.text];
	chars.splice(buffer.cursor - 1, 1);
	return { text: chars.join(""), cursor: buffer.cursor - 1 };
}

/**
 * Delete the character under the cursor.
 *
 * @param buffer - Current buffer
 */
export function deleteForward(buffer: QueryBuffer): QueryBuffer {
	const chars = [...buffer.text];
	if (buffer.cursor >= chars.length) return buffer;
	chars.splice(buffer.cursor, 1);
	return { text: chars.join(""), cursor: buffer.cursor };
}

/**
 * Move the cursor, clamped to the text.
 *
 * @param buffer - Current buffer
 * @param position - Target position in code points
 */
export function moveCursor(buffer: QueryBuffer, position: number): QueryBuffer {
	const length = [...buffer.text].length;
	const cursor = Math.min(Math.max(position, 0), length);
	return cursor === buffer.cursor ? buffer : { text: buffer.text, cursor };
}

/**
 * Apply one editing key to the buffer.
 *
 * @param buffer - Current buffer
 * @param data - Raw input from the terminal
 * @param limit - Maximum length in code points
 * @returns The edited buffer, or undefined when `data` is not an editing key
 */
export function applyEditKey(
	buffer: QueryBuffer,
	data: string,
	limit: number
): QueryBuffer | undefined {
	if (matchesKey(data, Key.backspace)) return deleteBackward(buffer);
	if (matchesKey(data, Key.delete)) return deleteForward(buffer);
	if (matchesKey(data, Key.left)) return moveCursor(buffer, buffer.cursor - 1);
	if (matchesKey(data, Key.right)) return moveCursor(buffer, buffer.cursor + 1);
	if (matchesKey(data, Key.home) || matchesKey(data, Key.ctrl("a"))) return moveCursor(buffer, 0);
	if (matchesKey(data, Key.end) || matchesKey(data, Key.ctrl("e"))) {
		return moveCursor(buffer, Number.MAX_SAFE_INTEGER);
	}
	if (matchesKey(data, Key.ctrl("u"))) return EMPTY_BUFFER;

	const text = decodeTextInput(data);
	return text === undefined ? undefined : insertText(buffer, text, limit);
}
