export type ByteRange = {
  start: number;
  end: number;
};

export type RangeParseResult =
  | { kind: 'satisfiable'; range: ByteRange }
  | { kind: 'unsatisfiable' }
  | { kind: 'malformed' };

const MALFORMED: RangeParseResult = { kind: 'malformed' };
const UNSATISFIABLE: RangeParseResult = { kind: 'unsatisfiable' };

const INTEGER_PATTERN = /^[+-]?\d+$/;

function parseInteger(value: string): number | null {
  const trimmed = value.trim();
  if (!INTEGER_PATTERN.test(trimmed)) {
    return null;
  }
  const parsed = Number(trimmed);
  return Number.isNaN(parsed) ? null : parsed;
}

/**
 * Parses a `Range` header against a resource of `totalSize` bytes.
 *
 * Only the first range of a multi-range header is considered. Headers that cannot be read
 * are `malformed` and should be ignored by the caller; a readable range that cannot be
 * served from this resource is `unsatisfiable`.
 */
export function parseRangeHeader(header: string, totalSize: number): RangeParseResult {
  const separator = header.indexOf('=');
  if (separator === -1) {
    return MALFORMED;
  }
  const unit = header.slice(0, separator).trim();
  if (unit.toLowerCase() !== 'bytes') {
    return MALFORMED;
  }

  const first = header.slice(separator + 1).split(',', 1)[0].trim();
  const dash = first.indexOf('-');
  if (dash === -1) {
    return MALFORMED;
  }
  const startPart = first.slice(0, dash);
  const endPart = first.slice(dash + 1);

  let start: number;
  let end: number;

  if (startPart === '') {
    const suffixLength = parseInteger(endPart);
    if (suffixLength === null || suffixLength <= 0) {
      return MALFORMED;
    }
    start = Math.max(totalSize - suffixLength, 0);
    end = totalSize > 0 ? totalSize - 1 : 0;
  } else {
    const parsedStart = parseInteger(startPart);
    if (parsedStart === null) {
      return MALFORMED;
    }
    start = parsedStart;
    if (endPart === '') {
      end = totalSize - 1;
    } else {
      const parsedEnd = parseInteger(endPart);
      if (parsedEnd === null) {
        return MALFORMED;
      }
      end = parsedEnd;
    }
  }

  if (start < 0) {
    return MALFORMED;
  }
  if (start >= totalSize) {
    return UNSATISFIABLE;
  }
  if (end >= totalSize) {
    end = totalSize - 1;
  }
  if (end < start) {
    return UNSATISFIABLE;
  }
  return { kind: 'satisfiable', range: { start, end } };
}

export function rangeLength(range: ByteRange): number {
  return range.end - range.start + 1;
}

export function formatContentRange(range: ByteRange, totalSize: number): string {
  return `bytes ${range.start}-${range.end}/${totalSize}`;
}

export function formatUnsatisfiedRange(totalSize: number): string {
  return `bytes */${totalSize}`;
}
