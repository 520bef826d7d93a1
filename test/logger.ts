import test from 'ava';

import {Logger, Level} from '../logger';
import {AffineMatrix} from '../graphics/matrix';
import {setLoggerLevel} from '../index';

function captureStderr(fn: () => void): string[] {
  const lines: string[] = [];
  const original = console.error;
  console.error = (...data: unknown[]) => {
    lines.push(data.join(' '));
  };
  try {
    fn();
  }
  finally {
    console.error = original;
  }
  return lines;
}

test.serial('logger should drop messages below its level', t => {
  const logger = new Logger(Level.warning);
  const lines = captureStderr(() => {
    logger.debug('quiet');
    logger.log(Level.info, 'quiet');
    logger.warning('careful');
    logger.error('broken', 42);
  });
  t.deepEqual(lines, ['[warning] careful', '[error] broken 42']);
});

test.serial('logger should report a non-affine grid at debug level', t => {
  const grid = [[1, 0, 0.5], [0, 1, 0], [0, 0, 2]];
  t.deepEqual(captureStderr(() => AffineMatrix.fromGrid(grid)), []);
  setLoggerLevel(Level.debug);
  try {
    t.deepEqual(captureStderr(() => AffineMatrix.fromGrid(grid)),
                ['[debug] AffineMatrix.fromGrid: third column is (0.5, 0, 2), not (0, 0, 1)']);
    t.deepEqual(captureStderr(() => AffineMatrix.fromGrid([[1, 0, 0], [0, 1, 0], [0, 0, 1]])), []);
  }
  finally {
    setLoggerLevel(Level.info);
  }
});
