/**
 * Walk-through of Option and Result on a small batch of user input.
 *
 * Run with: npm run example
 */

import { z } from 'zod';
import { Err, None, Ok, Option, Result, Some, filterMap, parseWith } from '../src';

const PortSchema = z.coerce.number().int().min(1).max(65535);

function evenAsText(x: number): Option<string> {
  return x % 2 === 1 ? None() : Some(String(x));
}

function divide(a: number, b: number): Result<number> {
  if (b === 0) {
    return Err(new Error('division by zero'));
  }
  return Ok(a / b);
}

filterMap([1, 2, 3, 4], evenAsText).forEach((x, i) => {
  console.log('[option-result]', i, x);
});

for (const raw of ['8080', 'eighty', '70000']) {
  const port = parseWith(PortSchema, raw);
  if (port.isErr()) {
    console.error('[option-result] invalid port:', port.toString());
    continue;
  }
  console.log('[option-result] port:', port.unwrapUnsafe());
}

console.log('[option-result]', divide(10, 4).toString(), divide(1, 0).toString());
