/**
 * Data Sizes
 *
 * Size of one test input: a single integer for unary programs, a pair for
 * binary programs. Unary sizes order before binary sizes; otherwise sizes
 * compare component by component.
 */

export type DataSize =
  | { kind: 'unary'; n: number }
  | { kind: 'binary'; n1: number; n2: number };

export function unarySize(n: number): DataSize {
  return { kind: 'unary', n };
}

export function binarySize(n1: number, n2: number): DataSize {
  return { kind: 'binary', n1, n2 };
}

export function compareDataSize(a: DataSize, b: DataSize): number {
  if (a.kind === 'unary') {
    return b.kind === 'unary' ? a.n - b.n : -1;
  }
  if (b.kind === 'unary') {
    return 1;
  }
  return a.n1 !== b.n1 ? a.n1 - b.n1 : a.n2 - b.n2;
}

export function dataSizeEquals(a: DataSize, b: DataSize): boolean {
  return compareDataSize(a, b) === 0;
}

/**
 * `5` for unary sizes, `(5, 4)` for binary sizes
 */
export function formatDataSize(size: DataSize): string {
  return size.kind === 'unary' ? String(size.n) : `(${size.n1}, ${size.n2})`;
}

/**
 * Sorted, duplicate-free copy
 */
export function distinctSizes(sizes: readonly DataSize[]): DataSize[] {
  const sorted = [...sizes].sort(compareDataSize);
  return sorted.filter((size, i) => {
    const previous = sorted[i - 1];
    return previous === undefined || !dataSizeEquals(previous, size);
  });
}

export function sizeSetsEqual(a: readonly DataSize[], b: readonly DataSize[]): boolean {
  const left = distinctSizes(a);
  const right = distinctSizes(b);
  return left.length === right.length && left.every((size, i) => {
    const other = right[i];
    return other !== undefined && dataSizeEquals(size, other);
  });
}

export function sizeComponents(size: DataSize): number[] {
  return size.kind === 'unary' ? [size.n] : [size.n1, size.n2];
}
