/**
 * Raised when a primary input (screening CSV, boundary catalog) is unreadable or malformed.
 * The pipeline does not run on partial input; callers stop and report the message.
 */
export class LoadError extends Error {
  readonly source?: string;

  constructor(message: string, source?: string) {
    super(source ? `${message} (${source})` : message);
    this.name = 'LoadError';
    this.source = source;
  }
}
