import { Injectable, Logger } from '@nestjs/common';
import { SshCommandService, SshCommandError } from '../ssh/ssh-command.service';
import { DiscoveryError } from '../discovery.errors';
import type { BackendDescriptor, DiscoverySource } from '../interfaces';
import { isValidContainerId, parseContainerList, selectAddress } from './podman.parsers';
import type { NetworkAttachments } from './podman.parsers';
import { getErrorMessage } from '../../shared/error.utils';

/**
 * Lists running containers carrying both routing labels. The format string is
 * interpreted by podman, which expands `\t` to a tab.
 */
export const LIST_CONTAINERS_COMMAND =
  'podman container list --filter label=exposed-port --filter label=exposed-fqdn --filter status=running --no-trunc ' +
  String.raw`--format '{{.ID}}\t{{.Names}}\t{{index .Labels "exposed-port"}}\t{{index .Labels "exposed-fqdn"}}'`;

export function inspectContainerCommand(id: string): string {
  return `podman container inspect ${id} --format json`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Discovery source backed by the podman CLI on a remote host.
 *
 * Containers opt in with two labels: `exposed-fqdn` (the hostname to route)
 * and `exposed-port` (the container port to forward to).
 */
@Injectable()
export class PodmanDiscoveryService implements DiscoverySource {
  private readonly logger = new Logger(PodmanDiscoveryService.name);

  /* v8 ignore next - false positive on constructor parameter property */
  constructor(private readonly ssh: SshCommandService) {}

  async list(): Promise<BackendDescriptor[]> {
    let output: string;
    try {
      output = await this.ssh.run(LIST_CONTAINERS_COMMAND);
    } catch (error) {
      throw new DiscoveryError('UNAVAILABLE', `Failed to list containers: ${getErrorMessage(error)}`, {
        cause: error,
      });
    }

    const { backends, rejected } = parseContainerList(output);

    for (const { line, reason } of rejected) {
      this.logger.warn(`Skipping container list line: ${reason}`, { line });
    }

    if (backends.length === 0 && rejected.length > 0) {
      throw new DiscoveryError('PARSE_ERROR', `None of the ${rejected.length} container list lines could be parsed`);
    }

    return backends;
  }

  async resolveAddress(id: string): Promise<string> {
    if (!isValidContainerId(id)) {
      throw new DiscoveryError('NOT_FOUND', `Invalid container id: ${id}`);
    }

    let output: string;
    try {
      output = await this.ssh.run(inspectContainerCommand(id));
    } catch (error) {
      if (error instanceof SshCommandError && /no such (container|object)/i.test(error.stderr ?? '')) {
        throw new DiscoveryError('NOT_FOUND', `Container ${id} no longer exists`, { cause: error });
      }
      throw new DiscoveryError('UNAVAILABLE', `Failed to inspect container ${id}: ${getErrorMessage(error)}`, {
        cause: error,
      });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(output);
    } catch (error) {
      throw new DiscoveryError(
        'UNAVAILABLE',
        `Failed to parse inspect output for ${id}: ${getErrorMessage(error)}`,
        { cause: error },
      );
    }

    if (!Array.isArray(parsed) || parsed.length !== 1) {
      const count = Array.isArray(parsed) ? parsed.length : 'non-array';
      throw new DiscoveryError('NOT_FOUND', `Unexpected inspect result for ${id} (${count} entries)`);
    }

    const address = this.extractAddress(parsed[0]);
    if (!address) {
      throw new DiscoveryError('NOT_FOUND', `Container ${id} has no network address`);
    }

    return address;
  }

  private extractAddress(entry: unknown): string | undefined {
    if (!isRecord(entry) || !isRecord(entry.NetworkSettings)) {
      return undefined;
    }

    const settings = entry.NetworkSettings;
    const networks: NetworkAttachments = {};
    if (isRecord(settings.Networks)) {
      for (const [name, attachment] of Object.entries(settings.Networks)) {
        networks[name] = isRecord(attachment) ? { IPAddress: attachment.IPAddress } : undefined;
      }
    }

    const selected = selectAddress(networks);
    if (selected) {
      return selected;
    }

    // Rootful containers on the default bridge report only the top-level address
    const fallback = settings.IPAddress;
    return typeof fallback === 'string' && fallback.trim() !== '' ? fallback.trim() : undefined;
  }
}
