// This file provides the public API of pdf-matrix. The type signatures of
// this module should follow proper versioning practices.
import {logger, Level} from './logger';

export {Level, Logger} from './logger';
export {InvalidArgumentError} from './errors';
export {AffineMatrix} from './graphics/matrix';
export type {Grid, Row, Shorthand} from './graphics/matrix';
export {transformPoint} from './graphics/geometry';
export type {Point} from './graphics/geometry';

export function setLoggerLevel(level: Level) {
  logger.level = level;
}
