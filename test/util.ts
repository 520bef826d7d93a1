import test from 'ava';

import {describeArguments, formatFixed} from '../util';

test('util should format finite numbers with fixed digits', t => {
  t.is(formatFixed(1, 6), '1.000000');
  t.is(formatFixed(792.123456789, 6), '792.123457');
  t.is(formatFixed(-0.25, 6), '-0.250000');
  t.is(formatFixed(3, 0), '3');
});

test('util should round exact ties half to even', t => {
  t.is(formatFixed(1 / 128, 6), '0.007812');
  t.is(formatFixed(3 / 128, 6), '0.023438');
  t.is(formatFixed(-1 / 128, 6), '-0.007812');
  t.is(formatFixed(2.5, 0), '2');
  t.is(formatFixed(3.5, 0), '4');
  t.is(formatFixed(0.125, 2), '0.12');
  t.is(formatFixed(0.375, 2), '0.38');
});

test('util should keep the sign of values that round to zero', t => {
  t.is(formatFixed(-0, 6), '-0.000000');
  t.is(formatFixed(-1e-9, 6), '-0.000000');
  t.is(formatFixed(1e-9, 6), '0.000000');
});

test('util should not use exponent notation for large values', t => {
  t.is(formatFixed(1e21, 1), '1000000000000000000000.0');
  t.is(formatFixed(-2e21, 0), '-2000000000000000000000');
});

test('util should format non-finite values', t => {
  t.is(formatFixed(NaN, 6), 'nan');
  t.is(formatFixed(Infinity, 6), 'inf');
  t.is(formatFixed(-Infinity, 6), '-inf');
});

test('util should describe arguments for error messages', t => {
  t.is(describeArguments([1, 'x', [2, [3]], null, undefined, {}, new Map()]),
       '1, "x", [2, [3]], null, undefined, Object, Map');
  t.is(describeArguments([]), '');
});
