/**
 * ANSI escape helpers for terminal output.
 */

export const ANSI = {
	cyan: "\x1b[36m",
	green: "\x1b[32m",
	red: "\x1b[31m",
	yellow: "\x1b[33m",
	dim: "\x1b[2m",
	bold: "\x1b[1m",
	reset: "\x1b[0m",
} as const;

export function isTTY(): boolean {
	return Boolean(process.stdin.isTTY && process.stdout.isTTY);
}

/**
 * Colors only on a TTY, and never when NO_COLOR is set.
 */
export function shouldUseColor(stream: { isTTY?: boolean } = process.stdout): boolean {
	if (process.env.NO_COLOR !== undefined) return false;
	return Boolean(stream.isTTY);
}
