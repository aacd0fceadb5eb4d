import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import type { IncomingMessage, ServerResponse } from 'http';
import httpProxy from 'http-proxy';
import { ROUTE_RESOLVER } from '../routing/routing.tokens';
import type { RouteResolver } from '../routing/interfaces';
import { MetricsService } from '../metrics/metrics.service';
import { METRIC_PATHS } from '../metrics/metrics.constants';

export const NO_BACKEND_BODY = '502 Bad Gateway: No backend service available for this host.\n';

/**
 * Forwards each gateway request to the backend its Host header routes to.
 * The route is looked up per request, so a newly published table applies to
 * the next request on a kept-alive connection.
 */
@Injectable()
export class ProxyService implements OnModuleDestroy {
  private readonly logger = new Logger(ProxyService.name);
  private readonly proxy = httpProxy.createProxyServer({ xfwd: true });

  /* v8 ignore next 4 - false positive on constructor parameter properties */
  constructor(
    @Inject(ROUTE_RESOLVER) private readonly routes: RouteResolver,
    private readonly metricsService: MetricsService,
  ) {}

  handle(req: IncomingMessage, res: ServerResponse): void {
    this.metricsService.increment(METRIC_PATHS.PROXY_REQUESTS_TOTAL);

    const host = req.headers.host ?? '';
    const route = host ? this.routes.resolve(host) : undefined;

    if (!route) {
      this.metricsService.increment(METRIC_PATHS.PROXY_NO_ROUTE_TOTAL);
      this.logger.debug(`No route for host "${host}"`);
      this.reply(res, NO_BACKEND_BODY);
      return;
    }

    const target = `http://${route.targetAddress}:${route.targetPort}`;
    this.proxy.web(
      req,
      res,
      {
        target,
        changeOrigin: true,
        headers: {
          'X-Forwarded-Host': host,
          'X-Forwarded-Proto': 'https',
        },
      },
      (error) => {
        this.metricsService.increment(METRIC_PATHS.PROXY_ERRORS_TOTAL);
        this.logger.warn(`Proxy error for ${route.fqdn} -> ${target}: ${error.message}`);
        if (!res.headersSent) {
          this.reply(res, `502 Bad Gateway: ${error.message}`);
        } else {
          res.destroy(error);
        }
      },
    );
  }

  onModuleDestroy(): void {
    this.proxy.close();
  }

  private reply(res: ServerResponse, body: string): void {
    res.writeHead(502, { 'Content-Type': 'text/plain; charset=utf-8' });
    res.end(body);
  }
}
