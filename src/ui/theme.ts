/**
 * Static style table for the renderer.
 *
 * A Theme is plain data handed to `render`; nothing here is mutable or
 * process-wide. Colours are 24-bit ANSI, built from hex values.
 */

/** Wraps text in styling escapes. */
export type StyleFn = (text: string) => string;

/** Every style the renderer uses. */
export interface Theme {
	/** App name on the search screen */
	readonly logo: StyleFn;
	/** Line under the logo */
	readonly tagline: StyleFn;
	/** Section labels ("SEARCH", "ERROR") */
	readonly label: StyleFn;
	readonly divider: StyleFn;
	readonly hint: StyleFn;
	/** Key badge in hint lines; text arrives already padded */
	readonly key: StyleFn;
	/** Search field prompt marker */
	readonly prompt: StyleFn;
	readonly inputText: StyleFn;
	readonly placeholder: StyleFn;
	/** Cell under the text cursor */
	readonly cursor: StyleFn;
	readonly spinner: StyleFn;
	/** "searching for" line */
	readonly loading: StyleFn;
	readonly border: StyleFn;
	readonly errorBorder: StyleFn;
	readonly errorText: StyleFn;
	/** "RESULTS" badge; text arrives already padded */
	readonly badge: StyleFn;
	/** Result count next to the badge */
	readonly count: StyleFn;
	readonly selectedTitle: StyleFn;
	readonly normalTitle: StyleFn;
	readonly selectedDesc: StyleFn;
	readonly normalDesc: StyleFn;
	/** Page indicator under the list */
	readonly pager: StyleFn;
}

/** Hex palette. */
export const PALETTE = {
	yellow: "#F5E642",
	white: "#EEEEEE",
	gray: "#888888",
	dark: "#444444",
	black: "#111111",
} as const;

/**
 * Split "#RRGGBB" into its channels.
 *
 * @param hex - Colour in #RRGGBB form
 */
function channels(hex: string): [number, number, number] {
	const value = Number.parseInt(hex.slice(1), 16);
	return [(value >> 16) & 0xff, (value >> 8) & 0xff, value & 0xff];
}

/**
 * Foreground colour.
 *
 * @param hex - Colour in #RRGGBB form
 */
export function fg(hex: string): StyleFn {
	const [r, g, b] = channels(hex);
	return (text) => `\x1b[38;2;${r};${g};${b}m${text}\x1b[39m`;
}

/**
 * Background colour.
 *
 * @param hex - Colour in #RRGGBB form
 */
export function bg(hex: string): StyleFn {
	const [r, g, b] = channels(hex);
	return (text) => `\x1b[48;2;${r};${g};${b}m${text}\x1b[49m`;
}

/** Bold text. */
export const bold: StyleFn = (text) => `\x1b[1m${text}\x1b[22m`;

/** Swap foreground and background. */
export const inverse: StyleFn = (text) => `\x1b[7m${text}\x1b[27m`;

/**
 * Compose styles, applied right to left.
 *
 * @param fns - Styles to combine
 */
export function compose(...fns: StyleFn[]): StyleFn {
	return (text) => fns.reduceRight((acc, fn) => fn(acc), text);
}

const identity: StyleFn = (text) => text;

/** Default colour theme. */
export const defaultTheme: Theme = {
	logo: compose(bold, fg(PALETTE.yellow)),
	tagline: fg(PALETTE.gray),
	label: compose(bold, fg(PALETTE.yellow)),
	divider: fg(PALETTE.dark),
	hint: fg(PALETTE.gray),
	key: compose(bold, fg(PALETTE.black), bg(PALETTE.yellow)),
	prompt: compose(bold, fg(PALETTE.yellow)),
	inputText: fg(PALETTE.white),
	placeholder: fg(PALETTE.gray),
	cursor: compose(inverse, fg(PALETTE.yellow)),
	spinner: fg(PALETTE.yellow),
	loading: compose(bold, fg(PALETTE.white)),
	border: fg(PALETTE.white),
	errorBorder: fg(PALETTE.yellow),
	errorText: fg(PALETTE.white),
	badge: compose(bold, fg(PALETTE.black), bg(PALETTE.yellow)),
	count: fg(PALETTE.gray),
	selectedTitle: compose(bold, fg(PALETTE.yellow)),
	normalTitle: fg(PALETTE.white),
	selectedDesc: fg(PALETTE.gray),
	normalDesc: fg(PALETTE.dark),
	pager: fg(PALETTE.dark),
};

/**
 * Theme without colour (NO_COLOR, --no-color). The cursor keeps reverse
 * video so the insertion point stays visible.
 */
export const plainTheme: Theme = {
	logo: identity,
	tagline: identity,
	label: identity,
	divider: identity,
	hint: identity,
	key: identity,
	prompt: identity,
	inputText: identity,
	placeholder: identity,
	cursor: inverse,
	spinner: identity,
	loading: identity,
	border: identity,
	errorBorder: identity,
	errorText: identity,
	badge: identity,
	count: identity,
	selectedTitle: identity,
	normalTitle: identity,
	selectedDesc: identity,
	normalDesc: identity,
	pager: identity,
};

/**
 * Pick the theme for a colour setting.
 *
 * @param color - Whether colour output is enabled
 */
export function themeFor(color: boolean): Theme {
	return color ? defaultTheme : plainTheme;
}
