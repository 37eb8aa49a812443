/**
 * Compact notation for sets of integers.
 *
 * A set such as {1, 2, 3, 5, 7, 9} is rendered as "1..3^5..9:2": a list of
 * spans joined by "^", where each span is a single integer, "first..last"
 * (stride 1) or "first..last:stride". Both ends of a span are inclusive.
 * This is the syntax the reduction commands accept in `visit=` selectors.
 */

/**
 * An arithmetic progression `first, first + stride, ..., last`.
 */
export interface Span {
  readonly first: number;
  readonly last: number;
  readonly stride: number;
}

function singleton(value: number): Span {
  return { first: value, last: value, stride: 1 };
}

/**
 * Whether both gaps around `values[center]` equal `stride`.
 * `center` must have a neighbour on each side.
 */
function isEvenAt(values: readonly number[], center: number, stride: number): boolean {
  return (
    values[center] - values[center - 1] === stride &&
    values[center + 1] - values[center] === stride
  );
}

/**
 * Smallest gap shared by two consecutive intervals, or undefined when no
 * three consecutive values are evenly spaced.
 */
function findStride(values: readonly number[]): number | undefined {
  let stride: number | undefined;
  for (let center = 1; center + 1 < values.length; center++) {
    const gap = values[center] - values[center - 1];
    if (gap === values[center + 1] - values[center] && (stride === undefined || gap < stride)) {
      stride = gap;
    }
  }
  return stride;
}

function spansOfSorted(values: readonly number[]): Span[] {
  if (values.length <= 2) {
    return values.map(singleton);
  }

  const stride = findStride(values);
  if (stride === undefined) {
    return values.map(singleton);
  }

  const spans: Span[] = [];
  // First index not yet covered by an emitted span.
  let pending = 0;
  let center = 1;

  while (center + 1 < values.length) {
    if (!isEvenAt(values, center, stride)) {
      center++;
      continue;
    }

    let lastCenter = center;
    while (lastCenter + 2 < values.length && isEvenAt(values, lastCenter + 1, stride)) {
      lastCenter++;
    }

    // The run of centers [center, lastCenter] covers [center - 1, lastCenter + 1].
    spans.push(...spansOfSorted(values.slice(pending, center - 1)));
    spans.push({ first: values[center - 1], last: values[lastCenter + 1], stride });

    pending = lastCenter + 2;
    center = lastCenter + 2;
  }

  // Every recursive call gets fewer values than this one: at least one run was found.
  spans.push(...spansOfSorted(values.slice(pending)));
  return spans;
}

/**
 * Convert integers to an equivalent list of spans, ordered by `first`.
 * Duplicates are ignored. Longer spans are preferred over singletons.
 */
export function getSpansFromIntegers(ints: Iterable<number>): Span[] {
  const values = [...new Set(ints)].sort((a, b) => a - b);
  for (const value of values) {
    if (!Number.isSafeInteger(value)) {
      throw new RangeError(`Not an integer: ${value}`);
    }
  }
  return spansOfSorted(values);
}

/**
 * Render one span in compact notation.
 */
export function formatSpan(span: Span): string {
  if (span.first === span.last) {
    return `${span.first}`;
  }
  if (span.stride === 1) {
    return `${span.first}..${span.last}`;
  }
  return `${span.first}..${span.last}:${span.stride}`;
}

/**
 * Convert integers to compact notation, e.g. [1, 3, 5, 7] → "1..7:2".
 */
export function getCompactNotationFromIntegers(ints: Iterable<number>): string {
  return getSpansFromIntegers(ints).map(formatSpan).join("^");
}

const TERM_RE = /^(-?\d+)(?:\.\.(-?\d+)(?::(\d+))?)?$/;

/**
 * Expand compact notation back to a sorted list of distinct integers.
 *
 * @throws SyntaxError on a malformed term
 */
export function expandCompactNotation(text: string): number[] {
  if (text.trim() === "") {
    return [];
  }
  const values = new Set<number>();

  for (const term of text.split("^")) {
    const match = TERM_RE.exec(term.trim());
    if (!match) {
      throw new SyntaxError(`Malformed span in compact notation: '${term}'`);
    }

    const first = Number(match[1]);
    const last = match[2] === undefined ? first : Number(match[2]);
    const stride = match[3] === undefined ? 1 : Number(match[3]);
    if (last < first || stride < 1) {
      throw new SyntaxError(`Malformed span in compact notation: '${term}'`);
    }

    for (let value = first; value <= last; value += stride) {
      values.add(value);
    }
  }

  return [...values].sort((a, b) => a - b);
}
