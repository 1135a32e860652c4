export const ansi = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  italic: '\x1b[3m',
  inverse: '\x1b[7m',
  red: '\x1b[31m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
  clearScreen: '\x1b[2J',
  clearLine: '\x1b[K',
  cursorHome: '\x1b[H',
  hideCursor: '\x1b[?25l',
  showCursor: '\x1b[?25h',
  altScreenOn: '\x1b[?1049h',
  altScreenOff: '\x1b[?1049l'
} as const;

export type Style = 'bold' | 'dim' | 'italic' | 'inverse' | 'error' | 'errorDetail' | 'errorSource' | 'muted' | 'accent';

const STYLE_CODES: Record<Style, string> = {
  bold: ansi.bold,
  dim: ansi.dim,
  italic: ansi.italic,
  inverse: ansi.inverse,
  error: `${ansi.bold}${ansi.red}`,
  errorDetail: `${ansi.dim}${ansi.red}`,
  errorSource: ansi.italic,
  muted: ansi.gray,
  accent: ansi.cyan
};

export class Styler {
  constructor(private readonly enabled: boolean) {}

  public apply(text: string, ...styles: (Style | undefined)[]): string {
    const codes = styles.filter((style): style is Style => style !== undefined).map((style) => STYLE_CODES[style]);
    if (!this.enabled || !codes.length) {
      return text;
    }
    return `${codes.join('')}${text}${ansi.reset}`;
  }
}

export function enterScreen(): string {
  return `${ansi.altScreenOn}${ansi.hideCursor}`;
}

export function leaveScreen(): string {
  return `${ansi.showCursor}${ansi.altScreenOff}`;
}

export function paintFrame(lines: readonly string[]): string {
  return `${ansi.cursorHome}${ansi.clearScreen}${lines.map((line) => `${line}${ansi.clearLine}`).join('\n')}`;
}
