/**
 * One step from a definition into one of its nested definitions.
 *
 * Paths are kept as segment lists while analyzing and only rendered to text
 * when an error is reported.
 */
export type PathSegment =
  | { readonly kind: 'key'; readonly key: string }
  | { readonly kind: 'index'; readonly index: number }
  | { readonly kind: 'argument'; readonly index: number }
  | { readonly kind: 'property'; readonly name: string }
  | { readonly kind: 'method'; readonly name: string; readonly index: number };

export const keySegment = (key: string | number): PathSegment =>
  typeof key === 'number' ? { kind: 'index', index: key } : { kind: 'key', key };

function renderSegment(segment: PathSegment): string {
  switch (segment.kind) {
    case 'key':
      return segment.key;
    case 'index':
      return `index ${segment.index}`;
    case 'argument':
      return `argument ${segment.index}`;
    case 'property':
      return `property ${segment.name}`;
    case 'method':
      return `${segment.name}() argument ${segment.index}`;
  }
}

/**
 * Render a path for diagnostics, e.g. `foo → bar → baz → index 0`.
 */
export function renderPath(entryId: string, path: readonly PathSegment[]): string {
  return [entryId, ...path.map(renderSegment)].join(' → ');
}
