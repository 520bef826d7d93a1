function typeOf(object: unknown): string {
  if (object === undefined) {
    return 'undefined';
  }
  if (object === null) {
    return 'null';
  }
  if (typeof object === 'object' && object.constructor && object.constructor.name) {
    return object.constructor.name;
  }
  return typeof object;
}

/**
Render a value for an error message. Arrays are expanded element by element;
other objects are reduced to the name of their constructor.
*/
export function describeValue(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(describeValue).join(', ')}]`;
  }
  if (typeof value === 'string') {
    return JSON.stringify(value);
  }
  if (typeof value === 'object' || typeof value === 'function') {
    return typeOf(value);
  }
  return String(value);
}

export function describeArguments(args: readonly unknown[]): string {
  return args.map(describeValue).join(', ');
}

/**
toFixed() rounds an exact tie up. A value that ties at {digits} is an integer
once scaled by 2^(digits + 1), and toFixed(digits + 1) then shows it exactly,
ending in 5.
*/
function roundHalfEven(magnitude: number, digits: number): string {
  const exact = magnitude.toFixed(digits + 1);
  if (!Number.isInteger(magnitude * 2 ** (digits + 1)) || !exact.endsWith('5')) {
    return magnitude.toFixed(digits);
  }
  const truncated = exact.slice(0, digits > 0 ? -1 : -2);
  const last = Number(truncated[truncated.length - 1]);
  return (last % 2 === 0) ? truncated : magnitude.toFixed(digits);
}

/**
Format a number like C's `%.<digits>f`: no exponent notation, a sign on
negative zero, exact ties rounded half to even, and `nan` / `inf` for the
non-finite values.

  formatFixed(1, 6) => '1.000000'
  formatFixed(-0, 2) => '-0.00'
  formatFixed(0.0078125, 6) => '0.007812'
  formatFixed(1e21, 1) => '1000000000000000000000.0'
*/
export function formatFixed(value: number, digits: number): string {
  if (Number.isNaN(value)) {
    return 'nan';
  }
  if (!Number.isFinite(value)) {
    return value < 0 ? '-inf' : 'inf';
  }
  const sign = (value < 0 || Object.is(value, -0)) ? '-' : '';
  const magnitude = Math.abs(value);
  if (magnitude < 1e21) {
    return sign + roundHalfEven(magnitude, digits);
  }
  // toFixed() switches to exponent notation from 1e21 up; every double that
  // large is an integer, so BigInt prints it exactly
  const fraction = digits > 0 ? `.${'0'.repeat(digits)}` : '';
  return `${sign}${BigInt(magnitude)}${fraction}`;
}
