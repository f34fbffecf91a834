/**
 * Golden suite: each fixture directory holds input.pbl, expected.txt (one
 * S-expression per parsed unit) and diagnostics.json.
 */

import { describe, it, expect } from 'vitest';
import { readdirSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { parseProgram, show, silentSink } from '../src/index.js';

const FIXTURES_DIR = fileURLToPath(new URL('./fixtures', import.meta.url));

const fixtures = readdirSync(FIXTURES_DIR)
  .filter((name) => /^\d{2}-/.test(name))
  .sort();

describe('golden fixtures', () => {
  it('finds fixtures', () => {
    expect(fixtures.length).toBeGreaterThan(0);
  });

  it.each(fixtures)('%s', (name) => {
    const dir = join(FIXTURES_DIR, name);
    const input = readFileSync(join(dir, 'input.pbl'), 'utf8');
    const expected = readFileSync(join(dir, 'expected.txt'), 'utf8').split('\n').filter(Boolean);
    const expectedDiagnostics: unknown = JSON.parse(readFileSync(join(dir, 'diagnostics.json'), 'utf8'));

    const { items, diagnostics } = parseProgram(input, { sink: silentSink });

    expect(items.map(show)).toEqual(expected);
    expect(
      diagnostics.map((d) => ({ code: d.code, line: d.pos?.line, column: d.pos?.column, msg: d.msg })),
    ).toEqual(expectedDiagnostics);
  });
});
