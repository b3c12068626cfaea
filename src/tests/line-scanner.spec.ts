import { describe, it, expect } from 'vitest';
import { LineScanner, RecordTooLongError } from '../engine/line-scanner.ts';

const b = (s: string) => Buffer.from(s);
const str = (records: Uint8Array[]) => records.map((r) => Buffer.from(r).toString());

describe('LineScanner', () => {
  it('joins records split across chunks', () => {
    const scanner = new LineScanner();
    expect(str(scanner.push(b('ab')))).toEqual([]);
    expect(str(scanner.push(b('c\nde')))).toEqual(['abc\n']);
    expect(str(scanner.push(b('\n')))).toEqual(['de\n']);
    expect(scanner.end()).toBeNull();
  });

  it('drops a carriage return before the newline', () => {
    const scanner = new LineScanner();
    expect(str(scanner.push(b('x\r\ny\r\n')))).toEqual(['x\n', 'y\n']);
  });

  it('keeps empty lines and flushes a final unterminated line', () => {
    const scanner = new LineScanner();
    expect(str(scanner.push(b('a\n\nb')))).toEqual(['a\n', '\n']);
    const last = scanner.end();
    expect(last && Buffer.from(last).toString()).toBe('b\n');
    expect(scanner.end()).toBeNull();
  });

  it('rejects a record longer than the limit', () => {
    expect(() => new LineScanner(4).push(b('12345\n'))).toThrow(RecordTooLongError);
    expect(() => new LineScanner(4).push(b('123456'))).toThrow(RecordTooLongError);
  });

  it('does not count the carriage return against the limit', () => {
    expect(str(new LineScanner(4).push(b('1234\r\n')))).toEqual(['1234\n']);
  });
});
