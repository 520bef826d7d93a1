import type {AffineMatrix} from './matrix';

export interface Point {
  x: number;
  y: number;
}

/**
Apply {matrix} to {point}, treating the point as the row vector [x y 1]:

  x' = a*x + c*y + e
  y' = b*x + d*y + f

If the matrix's third column is not (0, 0, 1), the result is divided through
by the homogeneous coordinate.

Returns a new Point object.
*/
export function transformPoint({x, y}: Point, matrix: AffineMatrix): Point {
  const [[a, b, u], [c, d, v], [e, f, w]] = matrix.values;
  const h = (u * x) + (v * y) + w;
  return {
    x: ((a * x) + (c * y) + e) / h,
    y: ((b * x) + (d * y) + f) / h,
  };
}
