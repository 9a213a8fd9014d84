/**
 * @mimicode/cli: ANSI styling for console output.
 */

const ESC = "\x1b[";

export const reset = `${ESC}0m`;

export function bold(s: string): string {
	return `${ESC}1m${s}${ESC}22m`;
}

export function dim(s: string): string {
	return `${ESC}2m${s}${ESC}22m`;
}

export function green(s: string): string {
	return `${ESC}32m${s}${reset}`;
}

export function yellow(s: string): string {
	return `${ESC}33m${s}${reset}`;
}

export function magenta(s: string): string {
	return `${ESC}35m${s}${reset}`;
}

export function cyan(s: string): string {
	return `${ESC}36m${s}${reset}`;
}

/** Gray (bright black) foreground. */
export function gray(s: string): string {
	return `${ESC}90m${s}${reset}`;
}

export interface Palette {
	bold(s: string): string;
	dim(s: string): string;
	green(s: string): string;
	yellow(s: string): string;
	magenta(s: string): string;
	cyan(s: string): string;
	gray(s: string): string;
}

const identity = (s: string) => s;

/** Styling functions, or pass-throughs when colour is off. */
export function palette(colors: boolean): Palette {
	if (!colors) {
		return { bold: identity, dim: identity, green: identity, yellow: identity, magenta: identity, cyan: identity, gray: identity };
	}
	return { bold, dim, green, yellow, magenta, cyan, gray };
}
