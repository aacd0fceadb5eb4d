/**
 * Connection settings for the SSH transport to the Podman host.
 */
export interface SshConfig {
  host: string;
  port: number;
  username: string;
  /** Path of the private key used for public-key authentication. */
  privateKeyPath: string;
  /** Milliseconds allowed for the handshake and, separately, for each command. */
  timeout: number;
}

/**
 * Settings for the reconciliation loop.
 */
export interface DiscoveryConfig {
  /** Milliseconds between reconciliation ticks. */
  interval: number;
  /** Upper bound on concurrent address resolutions within one tick. */
  concurrency: number;
}

/**
 * A running backend that asked to be exposed under a hostname.
 */
export interface BackendDescriptor {
  /** Opaque identifier, only meaningful to the source that produced it. */
  id: string;
  name: string;
  fqdn: string;
  port: number;
}

/**
 * Enumerates backends and resolves each one to a network address.
 *
 * `list` fails with a `DiscoveryError` of code UNAVAILABLE or PARSE_ERROR.
 * `resolveAddress` fails with NOT_FOUND or UNAVAILABLE.
 */
export interface DiscoverySource {
  list(): Promise<BackendDescriptor[]>;
  resolveAddress(id: string): Promise<string>;
}
