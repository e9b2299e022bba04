import { StarlarkSyntaxError, capture, formatSyntaxError, lineAndColumn, syntaxError } from '../src/types/Errors';

test('syntaxError leaves out missing expected and actual', () => {
    const error = syntaxError('empty-load', 3, 'nothing loaded');
    expect(error).toBeInstanceOf(StarlarkSyntaxError);
    expect(error.message).toBe('nothing loaded');
    expect(error.detail).toEqual({ kind: 'empty-load', offset: 3, message: 'nothing loaded' });
    expect('expected' in error.detail).toBe(false);
});

test('lineAndColumn is 1-based', () => {
    expect(lineAndColumn('abc', 0)).toEqual({ line: 1, column: 1 });
    expect(lineAndColumn('ab\ncd $', 6)).toEqual({ line: 2, column: 4 });
    expect(lineAndColumn('ab\n', 3)).toEqual({ line: 2, column: 1 });
});

test('lineAndColumn reads the offset as UTF-8 bytes', () => {
    // é is 2 bytes, € is 3
    expect(lineAndColumn('load("é€", $)', 14)).toEqual({ line: 1, column: 12 });
    expect(lineAndColumn('"é"\n€ x', 9)).toEqual({ line: 2, column: 3 });
});

test('formatSyntaxError prefixes the position', () => {
    const detail = syntaxError('unrecognized-character', 6, "Unrecognized character '$'").detail;
    expect(formatSyntaxError('ab\ncd $', detail)).toBe("2:4: Unrecognized character '$'");
});

test('capture converts syntax errors only', () => {
    expect(capture(() => 42)).toEqual({ ok: true, value: 42 });
    expect(
        capture(() => {
            throw syntaxError('unterminated-string', 0, 'Unterminated string');
        })
    ).toEqual({ ok: false, error: { kind: 'unterminated-string', offset: 0, message: 'Unterminated string' } });
    expect(() =>
        capture(() => {
            throw new TypeError('boom');
        })
    ).toThrow(TypeError);
});
