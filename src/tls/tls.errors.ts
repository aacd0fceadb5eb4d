/**
 * The ClientHello carried no usable server name.
 */
export class InvalidSniError extends Error {
  constructor(message = 'TLS client did not send a server name') {
    super(message);
    this.name = 'InvalidSniError';
  }
}

export class CertificateNotFoundError extends Error {
  constructor(public readonly serverName: string) {
    super(`No certificate available for ${serverName}`);
    this.name = 'CertificateNotFoundError';
  }
}
