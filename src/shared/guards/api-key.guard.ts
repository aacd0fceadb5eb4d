import { Injectable, CanActivate, ExecutionContext, UnauthorizedException, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { Request } from 'express';
import { timingSafeEqual } from 'crypto';
import { getErrorMessage } from '../error.utils';

/**
 * Protects the admin API with the X-API-Key header.
 * Without PODGATE_ADMIN_API_KEY every guarded request is rejected.
 */
@Injectable()
export class ApiKeyGuard implements CanActivate {
  private readonly logger = new Logger(ApiKeyGuard.name);
  private readonly apiKey: string | undefined;

  /* v8 ignore next - false positive on constructor parameter property */
  constructor(private readonly configService: ConfigService) {
    this.apiKey = this.configService.get<string>('podgate.admin.apiKey');

    if (!this.apiKey) {
      this.logger.warn('PODGATE_ADMIN_API_KEY not configured - admin API requests will be rejected');
    }
  }

  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<Request>();
    const providedKey = this.extractApiKey(request);

    if (!providedKey) {
      this.logger.warn(`API request without credentials path=${request.path}`);
      throw new UnauthorizedException('Missing X-API-Key header');
    }

    if (!this.apiKey) {
      throw new UnauthorizedException('API authentication not configured');
    }

    if (!this.constantTimeCompare(providedKey, this.apiKey)) {
      this.logger.warn(`API request with invalid API key path=${request.path}`);
      throw new UnauthorizedException('Invalid API key');
    }

    return true;
  }

  /**
   * Constant-time string comparison. Both inputs are padded to one length first
   * so the key length does not show in the timing.
   */
  private constantTimeCompare(a: string, b: string): boolean {
    try {
      const maxLen = Math.max(a.length, b.length, 32);
      const bufA = Buffer.alloc(maxLen);
      const bufB = Buffer.alloc(maxLen);
      Buffer.from(a, 'utf8').copy(bufA);
      Buffer.from(b, 'utf8').copy(bufB);

      const contentsEqual = timingSafeEqual(bufA, bufB);
      return contentsEqual && a.length === b.length;
      /* v8 ignore next 4 */
    } catch (error) {
      this.logger.error(`Error in constant-time comparison: ${getErrorMessage(error)}`);
      return false;
    }
  }

  private extractApiKey(request: Request): string | undefined {
    const header = request.headers['x-api-key'];
    return Array.isArray(header) ? header[0] : header;
  }
}
