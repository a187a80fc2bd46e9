/**
 * Numeric parsing and descriptive statistics shared by the parsers
 * and the wafer statistics aggregator.
 */

const FLOAT_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const INFINITY_PATTERN = /^([+-]?)inf(?:inity)?$/i;

/**
 * Parse a single float token. Returns undefined for anything that is not a
 * decimal/exponent literal or an infinity literal (hex, blanks, "1,5").
 */
export const parseFloatStrict = (token: string): number | undefined => {
  if (FLOAT_PATTERN.test(token)) {
    return Number(token);
  }
  const inf = INFINITY_PATTERN.exec(token);
  if (inf) {
    return inf[1] === "-" ? -Infinity : Infinity;
  }
  if (token.toLowerCase() === "nan") {
    return NaN;
  }
  return undefined;
};

/**
 * Coerce-or-exclude: the number a cell holds, or undefined when the cell is
 * blank, non-numeric or NaN.
 */
export const coerceNumber = (
  value: string | number | null | undefined,
): number | undefined => {
  if (value === null || value === undefined) {
    return undefined;
  }
  if (typeof value === "number") {
    return Number.isNaN(value) ? undefined : value;
  }
  const parsed = parseFloatStrict(value.trim());
  if (parsed === undefined || Number.isNaN(parsed)) {
    return undefined;
  }
  return parsed;
};

/**
 * Keep only the values that coerce to numbers, in input order.
 */
export const coerceNumericValues = (
  values: Iterable<string | number | null | undefined>,
): number[] => {
  const result: number[] = [];
  for (const value of values) {
    const num = coerceNumber(value);
    if (num !== undefined) {
      result.push(num);
    }
  }
  return result;
};

export const sum = (values: readonly number[]): number =>
  values.reduce((acc, v) => acc + v, 0);

export const mean = (values: readonly number[]): number =>
  values.length === 0 ? NaN : sum(values) / values.length;

export const median = (values: readonly number[]): number => {
  if (values.length === 0) return NaN;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 1
    ? sorted[mid]
    : (sorted[mid - 1] + sorted[mid]) / 2;
};

const sumOfSquares = (values: readonly number[]): number => {
  const m = mean(values);
  return values.reduce((acc, v) => acc + (v - m) ** 2, 0);
};

/**
 * Sample standard deviation (n - 1). 0 for fewer than two values.
 */
export const sampleStdDev = (values: readonly number[]): number =>
  values.length < 2 ? 0 : Math.sqrt(sumOfSquares(values) / (values.length - 1));

/**
 * Population standard deviation (n). 0 for fewer than two values.
 */
export const populationStdDev = (values: readonly number[]): number =>
  values.length < 2 ? 0 : Math.sqrt(sumOfSquares(values) / values.length);

export const min = (values: readonly number[]): number =>
  values.reduce((acc, v) => (v < acc ? v : acc), Infinity);

export const max = (values: readonly number[]): number =>
  values.reduce((acc, v) => (v > acc ? v : acc), -Infinity);
