import { Injectable, Logger, Inject } from '@nestjs/common';
import { setTimeout as delay } from 'timers/promises';
import * as acme from 'acme-client';
import type { Authorization, Client } from 'acme-client';
import type { AcmeIssuer, CertificateConfig, IssuedCertificate } from '../interfaces';
import type { DnsChallengeProvider } from '../dns/interfaces';
import { CertificateStorageService } from '../storage/certificate-storage.service';
import { CERTIFICATE_CONFIG } from '../certificate.tokens';
import { DNS_CHALLENGE_PROVIDER } from '../dns/dns.tokens';
import { AcmeError, classifyAcmeError } from '../certificate.errors';
import { getErrorMessage } from '../../shared/error.utils';

type Challenge = Authorization['challenges'][number];

export function challengeRecordName(domain: string): string {
  return `_acme-challenge.${domain}`;
}

/**
 * A wrapper around the 'acme-client' library that issues single-domain
 * certificates using DNS-01 challenges.
 */
@Injectable()
export class AcmeClientService implements AcmeIssuer {
  private readonly logger = new Logger(AcmeClientService.name);
  private client?: Client;
  private registered = false;

  /* v8 ignore next 5 - false positive on constructor parameter properties */
  constructor(
    @Inject(CERTIFICATE_CONFIG) private readonly config: CertificateConfig,
    private readonly storageService: CertificateStorageService,
    @Inject(DNS_CHALLENGE_PROVIDER) private readonly dns: DnsChallengeProvider,
  ) {}

  /**
   * Loads or creates the account key and registers the account.
   *
   * @throws {AccountCredentialError} If the stored account key is unusable.
   * @throws {AcmeError} If registration fails; `obtain` retries it later.
   */
  async initialize(): Promise<void> {
    const accountKey = await this.storageService.loadOrGenerateAccountKey();

    this.client = new acme.Client({
      directoryUrl: this.config.acmeDirectoryUrl,
      accountKey,
    });

    await this.register(this.client);
  }

  isRegistered(): boolean {
    return this.registered;
  }

  /**
   * Runs a full order for `domain`: DNS-01 for every pending authorization,
   * then CSR, finalization and chain download.
   */
  async obtain(domain: string, signal?: AbortSignal): Promise<IssuedCertificate> {
    const client = this.ensureClient();

    try {
      if (!this.registered) {
        await this.register(client);
      }

      this.logger.log('Creating ACME order', { domain });
      const order = await client.createOrder({ identifiers: [{ type: 'dns', value: domain }] });
      const authorizations = await client.getAuthorizations(order);

      for (const authorization of authorizations) {
        throwIfAborted(signal, domain);
        await this.satisfyAuthorization(client, authorization, signal);
      }

      throwIfAborted(signal, domain);
      const privateKey = await acme.forge.createPrivateKey();
      const [, csr] = await acme.forge.createCsr({ commonName: domain }, privateKey);

      const finalized = await client.finalizeOrder(order, csr);
      const chain = await client.getCertificate(finalized);

      this.logger.log('ACME order completed', { domain });
      return { certificateChain: Buffer.from(chain), privateKey };
    } catch (error) {
      if (error instanceof AcmeError) {
        throw error;
      }
      throw new AcmeError(classifyAcmeError(error), `ACME issuance for ${domain} failed: ${getErrorMessage(error)}`, {
        cause: error,
      });
    }
  }

  private async register(client: Client): Promise<void> {
    try {
      await client.createAccount({
        termsOfServiceAgreed: true,
        contact: [`mailto:${this.config.email}`],
      });
      this.registered = true;
      this.logger.log('ACME account created or loaded successfully');
    } catch (error) {
      const status = error instanceof Error && 'status' in error ? error.status : undefined;
      if (status === 409) {
        this.registered = true;
        this.logger.log('ACME account already exists; continuing');
        return;
      }

      // Registration has no challenge, so an unclassified failure is an account problem
      const classified = classifyAcmeError(error);
      const kind = classified === 'CHALLENGE_FAILED' ? 'ACCOUNT_INVALID' : classified;
      throw new AcmeError(kind, `ACME account registration failed: ${getErrorMessage(error)}`, { cause: error });
    }
  }

  /**
   * Publishes the DNS-01 record, waits until it is visible, and has the server
   * validate it. The record is removed afterwards whatever the outcome.
   */
  private async satisfyAuthorization(client: Client, authorization: Authorization, signal?: AbortSignal): Promise<void> {
    const domain = authorization.identifier.value;

    if (authorization.status === 'valid') {
      this.logger.debug(`Authorization for ${domain} already valid`);
      return;
    }

    const challenge = authorization.challenges.find((candidate) => candidate.type === 'dns-01');
    if (!challenge) {
      throw new AcmeError('CHALLENGE_FAILED', `No dns-01 challenge offered for ${domain}`);
    }

    // For dns-01 this is already the digest that goes into the TXT record
    const recordValue = await client.getChallengeKeyAuthorization(challenge);
    const recordName = challengeRecordName(domain);

    try {
      await this.dns.publish(recordName, recordValue);
    } catch (error) {
      throw new AcmeError('CHALLENGE_FAILED', `Publishing ${recordName} failed: ${getErrorMessage(error)}`, {
        cause: error,
      });
    }

    try {
      await this.waitForPropagation(client, authorization, challenge, recordName, signal);
      await client.completeChallenge(challenge);
      await client.waitForValidStatus(challenge);
    } finally {
      await this.dns.cleanup(recordName).catch((error: unknown) => {
        this.logger.warn(`Failed to remove ${recordName}: ${getErrorMessage(error)}`);
      });
    }
  }

  /**
   * Polls until the TXT record resolves with the expected value.
   */
  private async waitForPropagation(
    client: Client,
    authorization: Authorization,
    challenge: Challenge,
    recordName: string,
    signal?: AbortSignal,
  ): Promise<void> {
    const { propagationTimeout, pollInterval } = this.dns;
    const deadline = Date.now() + propagationTimeout;

    for (;;) {
      throwIfAborted(signal, authorization.identifier.value);

      try {
        if (await client.verifyChallenge(authorization, challenge)) {
          this.logger.log(`${recordName} is visible`);
          return;
        }
      } catch (error) {
        this.logger.debug(`${recordName} not visible yet: ${getErrorMessage(error)}`);
      }

      if (Date.now() + pollInterval > deadline) {
        throw new AcmeError('CHALLENGE_FAILED', `${recordName} did not propagate within ${propagationTimeout}ms`);
      }

      try {
        await delay(pollInterval, undefined, { signal });
      } catch (error) {
        throwIfAborted(signal, authorization.identifier.value);
        throw error;
      }
    }
  }

  /**
   * Ensures that the ACME client has been initialized.
   * @private
   */
  private ensureClient(): Client {
    if (!this.client) {
      throw new AcmeError('ACCOUNT_INVALID', 'ACME client not initialised');
    }
    return this.client;
  }
}

function throwIfAborted(signal: AbortSignal | undefined, domain: string): void {
  if (signal?.aborted) {
    throw new AcmeError('CHALLENGE_FAILED', `Issuance for ${domain} aborted by shutdown`);
  }
}
