// SPDX-License-Identifier: Apache-2.0

export class DeckhandError extends Error {
  public readonly statusCode?: number;

  /**
   * Create a custom error object
   *
   * error metadata will include the `cause`
   *
   * @param message error message
   * @param cause source error (if any)
   * @param meta additional metadata (if any)
   */
  public constructor(
    public override message: string,
    public override cause: unknown = {},
    public meta: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = this.constructor.name;
    this.statusCode = DeckhandError.extractStatusCode(cause);
    Error.captureStackTrace(this, this.constructor);
    if (cause) {
      this.cause = cause;
      if (cause instanceof Error) {
        this.stack += `\nCaused by: ${cause.stack}`;
      }
    }
  }

  private static extractStatusCode(cause: unknown): number | undefined {
    if (typeof cause === 'object' && cause !== null && 'statusCode' in cause) {
      const statusCode: unknown = cause.statusCode;
      return typeof statusCode === 'number' ? statusCode : undefined;
    }
    return undefined;
  }
}
