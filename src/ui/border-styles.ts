/**
 * Border character sets for box-drawing.
 *
 * @module
 */

/** A set of box-drawing characters for rendering borders. */
export interface BorderStyle {
	readonly topLeft: string;
	readonly topRight: string;
	readonly bottomLeft: string;
	readonly bottomRight: string;
	readonly horizontal: string;
	readonly vertical: string;
}

/** Sharp corners, standard box-drawing (┌┐└┘). */
export const SHARP: BorderStyle = {
	topLeft: "┌",
	topRight: "┐",
	bottomLeft: "└",
	bottomRight: "┘",
	horizontal: "─",
	vertical: "│",
};

/** Rounded corners (╭╮╰╯). */
export const ROUNDED: BorderStyle = {
	topLeft: "╭",
	topRight: "╮",
	bottomLeft: "╰",
	bottomRight: "╯",
	horizontal: "─",
	vertical: "│",
};
