import { Inject, Injectable, Logger } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import { firstValueFrom } from 'rxjs';
import { AxiosError } from 'axios';
import type { AxiosRequestConfig, AxiosResponse } from 'axios';
import type { DnsChallengeProvider, DnsConfig } from './interfaces';
import { DNS_CONFIG } from './dns.tokens';
import { DnsChallengeError } from './dns.errors';
import { normalizeDnsName } from '../../config/config.validators';
import { getErrorMessage } from '../../shared/error.utils';

/**
 * Derives the zone-relative record name: `recordFqdn` with `.zone` removed.
 *
 * @example deriveRecordName('_acme-challenge.app.example.com', 'example.com') // '_acme-challenge.app'
 * @throws {DnsChallengeError} If the record is not inside the zone.
 */
export function deriveRecordName(recordFqdn: string, zone: string): string {
  const fqdn = normalizeDnsName(recordFqdn);
  const suffix = `.${normalizeDnsName(zone)}`;

  if (suffix === '.' || !fqdn.endsWith(suffix) || fqdn.length === suffix.length) {
    throw new DnsChallengeError(`Could not derive record name from fqdn '${recordFqdn}' and base zone '${zone}'`);
  }

  return fqdn.slice(0, -suffix.length);
}

/**
 * DNS-01 provider for Gandi LiveDNS (API v5).
 */
@Injectable()
export class GandiDnsProvider implements DnsChallengeProvider {
  private readonly logger = new Logger(GandiDnsProvider.name);

  /* v8 ignore next 4 - false positive on constructor parameter properties */
  constructor(
    private readonly httpService: HttpService,
    @Inject(DNS_CONFIG) private readonly config: DnsConfig,
  ) {}

  get propagationTimeout(): number {
    return this.config.propagationTimeout;
  }

  get pollInterval(): number {
    return this.config.pollInterval;
  }

  /**
   * Creates the TXT record. A leftover record from an abandoned attempt is overwritten.
   */
  async publish(fqdn: string, value: string): Promise<void> {
    const recordName = deriveRecordName(fqdn, this.config.zone);
    const url = this.recordUrl(recordName);

    this.logger.log('Creating TXT record', { record: recordName, zone: this.config.zone });

    const created = await this.send({
      method: 'POST',
      url,
      data: { rrset_type: 'TXT', rrset_values: [value], rrset_ttl: this.config.ttl },
    });

    if (created.status === 201) {
      this.logger.log('TXT record created', { record: recordName, zone: this.config.zone });
      return;
    }

    if (created.status === 409) {
      this.logger.warn('TXT record already exists, replacing it', { record: recordName, zone: this.config.zone });
      const replaced = await this.send({
        method: 'PUT',
        url: `${url}/TXT`,
        data: { rrset_values: [value], rrset_ttl: this.config.ttl },
      });
      if (replaced.status === 200 || replaced.status === 201) {
        return;
      }
      throw this.apiError('replacing', recordName, replaced);
    }

    throw this.apiError('creating', recordName, created);
  }

  /**
   * Deletes the TXT record. A record that is already gone counts as success.
   */
  async cleanup(fqdn: string): Promise<void> {
    const recordName = deriveRecordName(fqdn, this.config.zone);

    this.logger.log('Deleting TXT record', { record: recordName, zone: this.config.zone });

    const response = await this.send({ method: 'DELETE', url: `${this.recordUrl(recordName)}/TXT` });

    if (response.status !== 204 && response.status !== 404) {
      throw this.apiError('deleting', recordName, response);
    }
  }

  private recordUrl(recordName: string): string {
    return `${this.config.apiUrl}/v5/livedns/domains/${encodeURIComponent(this.config.zone)}/records/${encodeURIComponent(recordName)}`;
  }

  /**
   * Sends a request and returns the response whatever its status.
   * Only transport failures throw.
   */
  private async send(request: AxiosRequestConfig): Promise<AxiosResponse<unknown>> {
    try {
      return await firstValueFrom(
        this.httpService.request<unknown>({
          ...request,
          headers: {
            Authorization: `Bearer ${this.config.apiKey}`,
            Accept: 'application/json',
            ...(request.data === undefined ? {} : { 'Content-Type': 'application/json' }),
          },
          timeout: this.config.requestTimeout,
          validateStatus: () => true,
        }),
      );
    } catch (error) {
      const reason = error instanceof AxiosError ? `${error.code ?? 'ERR'}: ${error.message}` : getErrorMessage(error);
      throw new DnsChallengeError(`Gandi API request failed: ${reason}`, undefined, { cause: error });
    }
  }

  private apiError(action: string, recordName: string, response: AxiosResponse<unknown>): DnsChallengeError {
    const body = typeof response.data === 'string' ? response.data : JSON.stringify(response.data);
    this.logger.error(`Gandi API error ${action} TXT record`, {
      status: response.status,
      body,
      record: recordName,
      zone: this.config.zone,
    });
    return new DnsChallengeError(
      `Gandi API error ${action} TXT record: status ${response.status}, body: ${body}`,
      response.status,
    );
  }
}
