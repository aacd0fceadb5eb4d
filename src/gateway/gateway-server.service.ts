import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import type { INestApplication } from '@nestjs/common';
import * as http from 'http';
import * as https from 'https';
import type { TLSSocket } from 'tls';
import { TlsDispatchService } from '../tls/tls-dispatch.service';
import { ProxyService } from './proxy.service';
import { ADMIN_CONFIG, GATEWAY_CONFIG } from './gateway.tokens';
import type { AdminConfig, GatewayConfig } from './interfaces';

export const GATEWAY_CIPHERS = [
  'ECDHE-ECDSA-AES256-GCM-SHA384',
  'ECDHE-RSA-AES256-GCM-SHA384',
  'ECDHE-ECDSA-CHACHA20-POLY1305',
  'ECDHE-RSA-CHACHA20-POLY1305',
  'ECDHE-ECDSA-AES128-GCM-SHA256',
  'ECDHE-RSA-AES128-GCM-SHA256',
].join(':');

type ClosableServer = http.Server | https.Server;

/**
 * Owns the two listeners:
 * - the HTTPS gateway, which picks a certificate per handshake by SNI and
 *   proxies to the routed backend
 * - the admin HTTP server for the Nest app (health, routes, certificates, metrics)
 *
 * The gateway has no default certificate, so handshakes without SNI or for
 * unknown names fail.
 */
@Injectable()
export class GatewayServerService implements OnModuleDestroy {
  private readonly logger = new Logger(GatewayServerService.name);
  private adminServer?: http.Server;
  private gatewayServer?: https.Server;

  /* v8 ignore next 6 - false positive on constructor parameter properties */
  constructor(
    @Inject(GATEWAY_CONFIG) private readonly gatewayConfig: GatewayConfig,
    @Inject(ADMIN_CONFIG) private readonly adminConfig: AdminConfig,
    private readonly tlsDispatch: TlsDispatchService,
    private readonly proxyService: ProxyService,
  ) {}

  /**
   * Starts both listeners. Called from main.ts after `app.init()`.
   */
  async initializeServers(app: INestApplication): Promise<void> {
    await this.startAdminServer(app);
    await this.startGatewayServer();
  }

  async onModuleDestroy(): Promise<void> {
    this.logger.log('Shutting down gateway and admin servers');

    const admin = this.adminServer;
    const gateway = this.gatewayServer;
    this.adminServer = undefined;
    this.gatewayServer = undefined;

    await Promise.all([
      gateway ? this.stopServer(gateway, 'Gateway') : Promise.resolve(),
      admin ? this.stopServer(admin, 'Admin') : Promise.resolve(),
    ]);
    this.logger.log('All servers shut down successfully');
  }

  private async startAdminServer(app: INestApplication): Promise<void> {
    const expressApp: http.RequestListener = app.getHttpAdapter().getInstance();
    const server = http.createServer(expressApp);
    this.adminServer = server;

    const { host, port } = this.adminConfig;
    await this.listen(server, port, host, 'Admin');
  }

  private async startGatewayServer(): Promise<void> {
    const options: https.ServerOptions = {
      SNICallback: (servername, cb) => this.tlsDispatch.sniCallback(servername, cb),
      minVersion: 'TLSv1.2',
      ciphers: GATEWAY_CIPHERS,
      honorCipherOrder: true,
    };

    const server = https.createServer(options, (req, res) => this.proxyService.handle(req, res));
    server.requestTimeout = this.gatewayConfig.requestTimeout;
    server.keepAliveTimeout = this.gatewayConfig.keepAliveTimeout;

    server.on('tlsClientError', (error: Error, socket: TLSSocket) => {
      this.logger.debug(`TLS handshake from ${socket.remoteAddress ?? 'unknown'} failed: ${error.message}`);
    });

    this.gatewayServer = server;

    const { host, port } = this.gatewayConfig;
    await this.listen(server, port, host, 'Gateway');
  }

  private listen(server: ClosableServer, port: number, host: string, label: string): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      server.once('error', (error: Error) => {
        this.logger.error(`${label} server failed to start: ${error.message}`);
        reject(error);
      });

      server.listen(port, host, () => {
        this.logger.log(`${label} server listening on ${host}:${port}`);
        resolve();
      });
    });
  }

  /**
   * Waits up to `closeTimeout` for connections to finish, then drops the rest.
   */
  private stopServer(server: ClosableServer, label: string): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const timeout = setTimeout(() => {
        this.logger.warn(`${label} server close timeout, forcing shutdown`);
        server.closeAllConnections();
        resolve();
      }, this.gatewayConfig.closeTimeout);

      server.closeIdleConnections();
      server.close((error) => {
        clearTimeout(timeout);
        if (error) {
          this.logger.error(`Error closing ${label} server: ${error.message}`);
          reject(error);
        } else {
          this.logger.log(`${label} server closed`);
          resolve();
        }
      });
    });
  }
}
