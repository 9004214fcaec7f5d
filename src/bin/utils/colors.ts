/**
 * Shared ANSI color utilities with TTY detection.
 * Colors are disabled when the target stream is not a TTY or when NO_COLOR is set.
 */

interface ColorTarget {
  isTTY?: boolean;
}

/**
 * Determines if color output should be used for a stream.
 * Evaluated lazily to allow tests to control via environment variables.
 * @internal Exported for testing
 */
export function shouldUseColor(stream: ColorTarget = process.stdout): boolean {
  return Boolean(stream.isTTY && !process.env.NO_COLOR);
}

/**
 * Color functions that check the given stream on every call.
 * @internal Exported for testing
 */
export function createColors(stream: ColorTarget) {
  const paint = (code: number) => (s: string) =>
    shouldUseColor(stream) ? `\x1b[${code}m${s}\x1b[0m` : s;

  return {
    green: paint(32),
    yellow: paint(33),
    red: paint(31),
    dim: paint(2),
    bold: paint(1),
  };
}

/** For text written with console.log */
export const colors = createColors(process.stdout);

/** For text written with console.error */
export const errorColors = createColors(process.stderr);
