/**
 * Minimal terminal colors
 *
 * Supports:
 * - Color detection (NO_COLOR, FORCE_COLOR, TERM, CI, TTY)
 * - A handful of foreground colors + bold
 * - Nestable: colors.bold(colors.red('text'))
 */

export type Paint = (s: string | number) => string;

export interface Colors {
  bold: Paint;
  red: Paint;
  green: Paint;
  yellow: Paint;
  cyan: Paint;
  gray: Paint;
}

export function detectColorSupport(
  env: NodeJS.ProcessEnv = process.env,
  isTTY: boolean = process.stdout?.isTTY ?? false
): boolean {
  // Respect NO_COLOR standard (https://no-color.org/)
  if ('NO_COLOR' in env) return false;
  if ('FORCE_COLOR' in env) return true;
  if (env.TERM === 'dumb') return false;
  if (isTTY) return true;
  return Boolean(env.CI);
}

export function createColors(enabled: boolean = detectColorSupport()): Colors {
  const code = (open: number, close: number): Paint => {
    if (!enabled) return (s) => String(s);

    const openCode = `\x1b[${open}m`;
    const closeCode = `\x1b[${close}m`;
    const closeRe = new RegExp(`\\x1b\\[${close}m`, 'g');

    // Re-open after any inner close so nesting keeps the outer style
    return (s) => openCode + String(s).replace(closeRe, openCode) + closeCode;
  };

  return {
    bold: code(1, 22),
    red: code(31, 39),
    green: code(32, 39),
    yellow: code(33, 39),
    cyan: code(36, 39),
    gray: code(90, 39),
  };
}

const colors = createColors();

export default colors;
