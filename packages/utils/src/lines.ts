/**
 * Incremental line splitter for diagnostic streams.
 *
 * Splits on either carriage return or newline and drops empty fragments,
 * so `\r`-overwritten status lines and `\r\n` endings both come out as
 * discrete lines. An unterminated tail is held until more input arrives.
 */
export class LineSplitter {
  private buffer = '';

  push(chunk: string): string[] {
    this.buffer += chunk;
    const parts = this.buffer.split(/[\r\n]/);
    this.buffer = parts.pop() ?? '';
    return parts.filter((part) => part.length > 0);
  }

  /**
   * Release whatever is left once the stream has ended
   */
  flush(): string[] {
    const rest = this.buffer;
    this.buffer = '';
    return rest.length > 0 ? [rest] : [];
  }
}

/**
 * Split a complete block of text the same way
 */
export function splitLines(text: string): string[] {
  const splitter = new LineSplitter();
  return [...splitter.push(text), ...splitter.flush()];
}
