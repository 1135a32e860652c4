import type { PathSegment } from './treeProjector';

export function formatJsonPath(segments: readonly PathSegment[]): string {
  let path = '$';
  for (const segment of segments) {
    if (typeof segment === 'number') {
      path += `[${segment}]`;
      continue;
    }

    if (/^[A-Za-z_][\w$]*$/.test(segment)) {
      path += `.${segment}`;
      continue;
    }

    const escaped = segment.replace(/\\/g, '\\\\').replace(/'/g, "\\'");
    path += `['${escaped}']`;
  }
  return path;
}
