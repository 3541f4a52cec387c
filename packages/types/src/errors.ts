/**
 * Raised when a statement does not follow the expected export layout.
 *
 * `line` is the 1-based physical line of the offending input and is appended
 * to the message as `(line N)`.
 */
export class FormatError extends Error {
  readonly line: number | undefined;

  constructor(message: string, line?: number, options?: ErrorOptions) {
    super(line === undefined ? message : `${message} (line ${line})`, options);
    this.name = 'FormatError';
    this.line = line;
  }
}
