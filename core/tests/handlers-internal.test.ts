import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { parse, tokenize } from '../src/core/handlers.js';

vi.mock('@pebble/runtime', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@pebble/runtime')>();
  return {
    ...actual,
    parseProgram: () => {
      throw new Error('parser unavailable');
    },
    tokenize: () => {
      throw new Error('lexer unavailable');
    },
  };
});

const auditLines = () =>
  vi
    .mocked(console.error)
    .mock.calls.map((call) => String(call[0]))
    .filter((line) => line.startsWith('[AUDIT] '))
    .map((line) => JSON.parse(line.slice('[AUDIT] '.length)));

describe('handlers: internal failures', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('turns a parser crash into an audited internal diagnostic', () => {
    const result = parse({ source: '1' }, { reqId: 'req-9' });

    expect(result).toMatchObject({
      value: null,
      diagnostics: [{ code: 'internal', message: 'parser unavailable', severity: 'error' }],
    });
    expect(auditLines()).toEqual([
      expect.objectContaining({ reqId: 'req-9', tool: 'parse', diagCounts: { error: 1, warning: 0, info: 0 } }),
    ]);
  });

  it('turns a lexer crash into an audited internal diagnostic', () => {
    const result = tokenize({ source: '1' }, { reqId: 'req-10' });

    expect(result.diagnostics).toEqual([{ code: 'internal', message: 'lexer unavailable', severity: 'error' }]);
    expect(auditLines()).toEqual([
      expect.objectContaining({ reqId: 'req-10', tool: 'tokenize', diagCounts: { error: 1, warning: 0, info: 0 } }),
    ]);
  });
});
