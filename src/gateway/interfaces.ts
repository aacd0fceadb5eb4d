export interface GatewayConfig {
  host: string;
  port: number;
  /** Milliseconds to wait for open connections at shutdown before forcing them closed. */
  closeTimeout: number;
  requestTimeout: number;
  keepAliveTimeout: number;
}

export interface AdminConfig {
  host: string;
  port: number;
  apiKey?: string;
}
