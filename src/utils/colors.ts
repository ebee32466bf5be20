/**
 * Minimal terminal colors utility
 *
 * Supports:
 * - Color detection (NO_COLOR, FORCE_COLOR, TERM, CI, TTY)
 * - The handful of colors the CLI prints with
 * - Nestable: colors.bold(colors.red('text'))
 */

export type Colorizer = (s: string | number) => string;

export interface Colors {
  bold: Colorizer;
  red: Colorizer;
  green: Colorizer;
  yellow: Colorizer;
  cyan: Colorizer;
  gray: Colorizer;
}

export function detectColors(env: NodeJS.ProcessEnv = process.env, isTTY = process.stdout?.isTTY ?? false): boolean {
  // https://no-color.org/
  if ('NO_COLOR' in env) return false;
  if ('FORCE_COLOR' in env) return true;
  if (env.TERM === 'dumb') return false;
  if (isTTY) return true;
  if (env.CI) return true;
  return false;
}

// ANSI escape code wrapper
const code = (enabled: boolean, open: number, close: number): Colorizer => {
  if (!enabled) return (s) => String(s);

  const openCode = `\x1b[${open}m`;
  const closeCode = `\x1b[${close}m`;
  const closeRe = new RegExp(`\\x1b\\[${close}m`, 'g');

  return (s) => openCode + String(s).replace(closeRe, openCode) + closeCode;
};

export function createColors(enabled: boolean): Colors {
  return {
    bold: code(enabled, 1, 22),
    red: code(enabled, 31, 39),
    green: code(enabled, 32, 39),
    yellow: code(enabled, 33, 39),
    cyan: code(enabled, 36, 39),
    gray: code(enabled, 90, 39),
  };
}

const colors = createColors(detectColors());

export default colors;
