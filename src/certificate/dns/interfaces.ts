/**
 * Settings for publishing DNS-01 challenges through Gandi LiveDNS.
 */
export interface DnsConfig {
  apiUrl: string;
  apiKey: string;
  /** Base zone, without trailing dot. Every challenge record must sit under it. */
  zone: string;
  /** TXT record TTL in seconds. */
  ttl: number;
  /** Overall milliseconds to wait for a published record to become visible. */
  propagationTimeout: number;
  /** Milliseconds between propagation checks. */
  pollInterval: number;
  /** Milliseconds allowed for each API request. */
  requestTimeout: number;
}

/**
 * Publishes and removes the TXT record that answers a DNS-01 challenge.
 * `fqdn` is the full record name, such as `_acme-challenge.app.example.com`.
 */
export interface DnsChallengeProvider {
  readonly propagationTimeout: number;
  readonly pollInterval: number;
  publish(fqdn: string, value: string): Promise<void>;
  cleanup(fqdn: string): Promise<void>;
}
