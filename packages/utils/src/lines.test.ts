import { describe, it, expect } from 'vitest';
import { LineSplitter, splitLines } from './lines.js';

describe('LineSplitter', () => {
  it('splits on newlines and carriage returns', () => {
    const splitter = new LineSplitter();
    expect(splitter.push('frame=1 time=00:00:01.00\rframe=2 time=00:00:02.00\n')).toEqual([
      'frame=1 time=00:00:01.00',
      'frame=2 time=00:00:02.00',
    ]);
  });

  it('drops the empty fragment between \\r and \\n', () => {
    const splitter = new LineSplitter();
    expect(splitter.push('a\r\nb\r\n\r\n')).toEqual(['a', 'b']);
  });

  it('holds an unterminated tail until the next chunk', () => {
    const splitter = new LineSplitter();
    expect(splitter.push('Duration: 00:0')).toEqual([]);
    expect(splitter.push('1:30.00, start\nfra')).toEqual(['Duration: 00:01:30.00, start']);
    expect(splitter.push('me=10\r')).toEqual(['frame=10']);
  });

  it('releases the remaining tail on flush', () => {
    const splitter = new LineSplitter();
    splitter.push('first\nlast line');
    expect(splitter.flush()).toEqual(['last line']);
    expect(splitter.flush()).toEqual([]);
  });
});

describe('splitLines', () => {
  it('splits a whole block including an unterminated last line', () => {
    expect(splitLines('one\r\rtwo\nthree')).toEqual(['one', 'two', 'three']);
  });
});
