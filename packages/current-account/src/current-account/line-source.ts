/**
 * Pulls statement lines one at a time and tracks the 1-based number of the
 * line most recently requested. Past the end of input `line` is one beyond
 * the last line; `linesRead` stays on it.
 */
export class LineSource {
  private readonly iterator: AsyncIterator<string>;
  private lineNumber = 0;
  private delivered = 0;

  constructor(lines: AsyncIterable<string> | Iterable<string>) {
    this.iterator = toAsyncIterable(lines)[Symbol.asyncIterator]();
  }

  get line(): number {
    return this.lineNumber;
  }

  get linesRead(): number {
    return this.delivered;
  }

  /**
   * Next line without its terminator, or `undefined` once the input is
   * exhausted. The counter advances either way.
   */
  async next(): Promise<string | undefined> {
    this.lineNumber += 1;
    const result = await this.iterator.next();
    if (result.done === true) {
      return undefined;
    }
    this.delivered += 1;
    return result.value.replace(/\r$/, '');
  }

  async close(): Promise<void> {
    await this.iterator.return?.();
  }
}

async function* toAsyncIterable(lines: AsyncIterable<string> | Iterable<string>): AsyncGenerator<string, void, undefined> {
  for await (const line of lines) {
    yield line;
  }
}
