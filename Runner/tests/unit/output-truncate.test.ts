import { describe, it, expect } from 'vitest';
import { OutputCapture, truncateOutput } from '../../src/utils/output-truncate.js';

const config = { maxChars: 20, head: 5, tail: 5 };

describe('truncateOutput', () => {
  it('should leave output within the limit untouched', () => {
    expect(truncateOutput('short output', config)).toEqual({ text: 'short output', truncated: false });
  });

  it('should keep the head and tail of long output', () => {
    const output = 'AAAAA' + 'x'.repeat(30) + 'ZZZZZ';
    expect(truncateOutput(output, config)).toEqual({
      text: 'AAAAA\n\n[... truncated 30 characters ...]\n\nZZZZZ',
      truncated: true,
    });
  });

  it('should keep the final traceback line', () => {
    const stderr = 'Traceback (most recent call last):\n' + '  File "<string>", line 2\n'.repeat(50) + 'ZeroDivisionError: division by zero';
    const result = truncateOutput(stderr, { maxChars: 200, head: 40, tail: 60 });
    expect(result.truncated).toBe(true);
    expect(result.text.endsWith('ZeroDivisionError: division by zero')).toBe(true);
  });
});

describe('OutputCapture', () => {
  it('should return everything when the limit is never reached', () => {
    const capture = new OutputCapture(config);
    capture.write(Buffer.from('hello '));
    capture.write(Buffer.from('world'));

    expect(capture.finish()).toEqual({ text: 'hello world', truncated: false });
    expect(capture.droppedChars).toBe(0);
  });

  it('should hold only head and tail while far more is written', () => {
    const capture = new OutputCapture({ maxChars: 100, head: 10, tail: 20 });
    capture.write('HEAD-START');
    for (let i = 0; i < 1000; i++) {
      capture.write(Buffer.from('.'.repeat(100)));
      expect(capture.retainedChars).toBeLessThanOrEqual(130);
    }
    capture.write('...........TAIL-FINISH');

    expect(capture.seenChars).toBe(100_032);
    expect(capture.droppedChars).toBe(100_002);
    expect(capture.finish()).toEqual({
      text: 'HEAD-START\n\n[... truncated 100002 characters ...]\n\n.........TAIL-FINISH',
      truncated: true,
    });
  });

  it('should reassemble a character split across chunks', () => {
    const bytes = Buffer.from('café', 'utf-8');
    const capture = new OutputCapture(config);
    capture.write(bytes.subarray(0, 4));
    capture.write(bytes.subarray(4));

    expect(capture.finish().text).toBe('café');
  });
});
