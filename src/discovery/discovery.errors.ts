export type DiscoveryErrorCode = 'UNAVAILABLE' | 'PARSE_ERROR' | 'NOT_FOUND';

/**
 * Raised by a discovery source when listing or resolving fails.
 */
export class DiscoveryError extends Error {
  constructor(
    public readonly code: DiscoveryErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'DiscoveryError';
  }
}
