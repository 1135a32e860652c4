export const ELLIPSIS = '...';

const CONTROL_ESCAPES: Record<string, string> = {
  '\n': '\\n',
  '\r': '\\r',
  '\t': '\\t'
};

// Limits count code points, not UTF-16 units.
export function exceedsLimit(text: string, limit: number): boolean {
  if (text.length <= limit) {
    return false;
  }
  return Array.from(text).length > limit;
}

export function truncateText(text: string, limit: number): string {
  if (!exceedsLimit(text, limit)) {
    return text;
  }
  return `${Array.from(text).slice(0, limit).join('')}${ELLIPSIS}`;
}

export function escapeControlCharacters(text: string): string {
  return text.replace(/[\u0000-\u001f\u007f]/g, (char) => {
    const known = CONTROL_ESCAPES[char];
    if (known) {
      return known;
    }
    return `\\u${char.charCodeAt(0).toString(16).padStart(4, '0')}`;
  });
}

export function clipText(text: string, width: number): string {
  if (width <= 0) {
    return '';
  }
  const chars = Array.from(text);
  if (chars.length <= width) {
    return text;
  }
  return `${chars.slice(0, width - 1).join('')}…`;
}

export function wrapText(text: string, width: number): string[] {
  const columns = Math.max(1, width);
  const lines: string[] = [];
  for (const physical of text.split(/\r\n|\n|\r/)) {
    const chars = Array.from(escapeControlCharacters(physical));
    if (!chars.length) {
      lines.push('');
      continue;
    }
    for (let start = 0; start < chars.length; start += columns) {
      lines.push(chars.slice(start, start + columns).join(''));
    }
  }
  return lines;
}
