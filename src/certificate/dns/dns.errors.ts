/**
 * A DNS-01 record could not be named, published or removed.
 */
export class DnsChallengeError extends Error {
  constructor(
    message: string,
    public readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'DnsChallengeError';
  }
}
