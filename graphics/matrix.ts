import {range} from 'tarry';

import {logger} from '../logger';
import {InvalidArgumentError} from '../errors';
import {formatFixed} from '../util';
import {Point, transformPoint} from './geometry';

/**
> Because a transformation matrix has only six elements that can be changed, in most cases in PDF it shall be specified as the six-element array [a b c d e f].

                 ⎡ a b 0 ⎤
[a b c d e f] => ⎢ c d 0 ⎥
                 ⎣ e f 1 ⎦

PDF uses row vectors: the point (x, y) is transformed as [x y 1] × M.
*/
export type Row = readonly [number, number, number];
export type Grid = readonly [Row, Row, Row];
export type Shorthand = [number, number, number, number, number, number];

// grids built here are frozen all the way down and can be shared
const frozenGrids = new WeakSet<Grid>();

function makeGrid(r0: Row, r1: Row, r2: Row): Grid {
  const grid = Object.freeze([Object.freeze(r0), Object.freeze(r1), Object.freeze(r2)] as const);
  frozenGrids.add(grid);
  return grid;
}

function shorthandGrid(a: number, b: number, c: number, d: number, e: number, f: number): Grid {
  return makeGrid([a, b, 0],
                  [c, d, 0],
                  [e, f, 1]);
}

const identityGrid = shorthandGrid(1, 0, 0, 1, 0, 0);

function isArrayLike(value: unknown): value is ArrayLike<unknown> {
  return Array.isArray(value) || (ArrayBuffer.isView(value) && !(value instanceof DataView));
}

const decimalPattern = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;
const nonFinitePattern = /^([+-]?)(inf|infinity|nan)$/i;

/**
Coerce a single loosely-typed operand to a number. Booleans count as 0 and 1;
strings must be decimal (`12`, `-.5`, `1e3`) or one of `inf`, `infinity` and
`nan`, optionally signed. Anything else is rejected along with the full
argument list it came from.
*/
function coerceNumber(value: unknown, args: readonly unknown[]): number {
  if (typeof value === 'number') {
    return value;
  }
  if (typeof value === 'bigint' || typeof value === 'boolean') {
    return Number(value);
  }
  if (typeof value === 'string') {
    const text = value.trim();
    if (decimalPattern.test(text)) {
      return Number(text);
    }
    const nonFinite = nonFinitePattern.exec(text);
    if (nonFinite) {
      const [, sign, name] = nonFinite;
      if (name.toLowerCase() === 'nan') {
        return NaN;
      }
      return sign === '-' ? -Infinity : Infinity;
    }
  }
  throw new InvalidArgumentError(args);
}

/**
An immutable 2D affine transformation in PDF's convention. Every transforming
method returns a new matrix.

The third column is (0, 0, 1) for every instance except those built with
fromGrid(), which copies whatever it is given.
*/
export class AffineMatrix {
  readonly values: Grid;

  /**
  Wraps the given grid; with no argument this is the identity matrix.
  Use the static factories for anything else.
  */
  constructor(values: Grid = identityGrid) {
    this.values = frozenGrids.has(values) ? values : makeGrid([...values[0]], [...values[1]], [...values[2]]);
  }

  static identity(): AffineMatrix {
    return new AffineMatrix();
  }

  static fromCoefficients(a: number, b: number, c: number, d: number, e: number, f: number): AffineMatrix {
    return new AffineMatrix(shorthandGrid(a, b, c, d, e, f));
  }

  /**
  Build a matrix from the six-element array [a b c d e f], e.g., the
  operands of a `cm` operator or a form XObject's /Matrix entry.
  */
  static fromShorthand(shorthand: ArrayLike<number>): AffineMatrix {
    if (shorthand.length !== 6) {
      throw new InvalidArgumentError([shorthand]);
    }
    const [a, b, c, d, e, f] = Array.from(shorthand);
    return AffineMatrix.fromCoefficients(a, b, c, d, e, f);
  }

  /**
  Copy a 3x3 grid, row by row. The third column is not checked, so the result
  may not be an affine transformation at all.
  */
  static fromGrid(rows: ArrayLike<ArrayLike<number>>): AffineMatrix {
    if (rows.length !== 3 || !Array.from(rows).every(row => row.length === 3)) {
      throw new InvalidArgumentError([rows]);
    }
    const [r0, r1, r2] = Array.from(rows, (row): Row => [row[0], row[1], row[2]]);
    if (r0[2] !== 0 || r1[2] !== 0 || r2[2] !== 1) {
      logger.debug(`AffineMatrix.fromGrid: third column is (${r0[2]}, ${r1[2]}, ${r2[2]}), not (0, 0, 1)`);
    }
    return new AffineMatrix(makeGrid(r0, r1, r2));
  }

  static copyOf(other: AffineMatrix): AffineMatrix {
    return new AffineMatrix(other.values);
  }

  /**
  Build a matrix from loosely-typed input, dispatching on its shape:

  - no arguments: the identity matrix
  - six scalars: a, b, c, d, e, f
  - another AffineMatrix: a copy
  - a six-element sequence: [a, b, c, d, e, f]
  - a 3x3 nested sequence: the full grid (see fromGrid)

  Scalars may be numbers, bigints, booleans or decimal strings. Anything else
  throws an InvalidArgumentError.
  */
  static from(...args: unknown[]): AffineMatrix {
    if (args.length === 0) {
      return AffineMatrix.identity();
    }
    if (args.length === 6) {
      return AffineMatrix.fromShorthand(args.map(arg => coerceNumber(arg, args)));
    }
    if (args.length === 1) {
      const [arg] = args;
      if (arg instanceof AffineMatrix) {
        return AffineMatrix.copyOf(arg);
      }
      if (isArrayLike(arg)) {
        const items = Array.from(arg);
        if (items.length === 6) {
          return AffineMatrix.fromShorthand(items.map(item => coerceNumber(item, args)));
        }
        const rows = items.filter(isArrayLike);
        if (items.length === 3 && rows.length === 3 && rows.every(row => row.length === 3)) {
          return AffineMatrix.fromGrid(rows.map(row => Array.from(row, cell => coerceNumber(cell, args))));
        }
      }
    }
    throw new InvalidArgumentError(args);
  }

  /**
  Matrix product `this × other`: the result applies this transformation
  first, then `other`. All nine cells are computed, so grids with a
  non-standard third column compose correctly too.
  */
  compose(other: AffineMatrix): AffineMatrix {
    const A = this.values;
    const B = other.values;
    const cell = (i: number, j: number) => range(3).reduce((sum, k) => sum + (A[i][k] * B[k][j]), 0);
    const row = (i: number): Row => [cell(i, 0), cell(i, 1), cell(i, 2)];
    return new AffineMatrix(makeGrid(row(0), row(1), row(2)));
  }

  /**
  > Scaling shall be obtained by [sx 0 0 sy 0 0].
  */
  scaled(x: number, y: number): AffineMatrix {
    return this.compose(AffineMatrix.fromCoefficients(x, 0, 0, y, 0, 0));
  }

  /**
  > Rotations shall be produced by [cos q sin q -sin q cos q 0 0], which has
  > the effect of rotating the coordinate system axes by an angle q counter
  > clockwise.
  */
  rotated(angleDegreesCcw: number): AffineMatrix {
    const angle = angleDegreesCcw / 180 * Math.PI;
    const cos = Math.cos(angle);
    const sin = Math.sin(angle);
    return this.compose(AffineMatrix.fromCoefficients(cos, sin, -sin, cos, 0, 0));
  }

  /**
  > Translations shall be specified as [1 0 0 1 tx ty].
  */
  translated(x: number, y: number): AffineMatrix {
    return this.compose(AffineMatrix.fromCoefficients(1, 0, 0, 1, x, y));
  }

  /** The six-element array [a b c d e f]. */
  get shorthand(): Shorthand {
    return [this.a, this.b, this.c, this.d, this.e, this.f];
  }

  get a(): number { return this.values[0][0]; }
  get b(): number { return this.values[0][1]; }
  get c(): number { return this.values[1][0]; }
  get d(): number { return this.values[1][1]; }
  /** Usually the translation along the x-axis. */
  get e(): number { return this.values[2][0]; }
  /** Usually the translation along the y-axis. */
  get f(): number { return this.values[2][1]; }

  /**
  Exact, element-wise comparison of the shorthand; no tolerance is applied.
  */
  equals(other: unknown): boolean {
    if (!(other instanceof AffineMatrix)) {
      return false;
    }
    const theirs = other.shorthand;
    return this.shorthand.every((value, i) => value === theirs[i]);
  }

  transformPoint(point: Point): Point {
    return transformPoint(point, this);
  }

  /**
  The operands for a `cm` or `Tm` operator: six numbers with six fractional
  digits each, separated by single spaces.
  */
  encodeString(): string {
    return this.shorthand.map(value => formatFixed(value, 6)).join(' ');
  }

  encode(): Buffer {
    return Buffer.from(this.encodeString(), 'ascii');
  }

  toJSON(): Shorthand {
    return this.shorthand;
  }

  toString(): string {
    const rows = this.values.map(row => `[${row.join(', ')}]`);
    return `AffineMatrix([${rows.join(', ')}])`;
  }
}
