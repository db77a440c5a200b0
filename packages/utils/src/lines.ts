/**
 * Line Splitting
 *
 * Incremental splitter for subprocess output. Engines terminate status
 * lines with "\n", "\r\n" or a bare "\r" (HandBrake redraws its progress
 * line in place), so all three count as a line break.
 */

const LINE_BREAK = /\r\n|\r|\n/;

export class LineSplitter {
  private buffer = '';

  /**
   * Add a chunk and return the complete, non-empty lines it finished
   */
  push(chunk: string): string[] {
    this.buffer += chunk;
    const parts = this.buffer.split(LINE_BREAK);
    this.buffer = parts.pop() ?? '';

    // A chunk ending in "\r" may be the first half of "\r\n"; the empty
    // line produced by the following "\n" is dropped below.
    return parts.map(line => line.trimEnd()).filter(line => line.length > 0);
  }

  /**
   * Return whatever is left once the stream has ended
   */
  flush(): string[] {
    const rest = this.buffer.trimEnd();
    this.buffer = '';
    return rest.length > 0 ? [rest] : [];
  }
}
