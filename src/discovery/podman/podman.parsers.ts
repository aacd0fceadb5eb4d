import type { BackendDescriptor } from '../interfaces';
import { isSafeFqdn, isValidDomain, normalizeDnsName } from '../../config/config.validators';

/**
 * A line of `podman container list` output that could not be turned into a backend.
 */
export interface RejectedLine {
  line: string;
  reason: string;
}

export interface ContainerListParseResult {
  backends: BackendDescriptor[];
  rejected: RejectedLine[];
}

/** Network attachments as reported by `podman container inspect`. */
export type NetworkAttachments = Record<string, { IPAddress?: unknown } | null | undefined>;

const CONTAINER_ID_PATTERN = /^[A-Za-z0-9_.-]+$/;

export function isValidContainerId(id: string): boolean {
  return CONTAINER_ID_PATTERN.test(id);
}

function parsePortLabel(value: string): number | undefined {
  if (!/^\d+$/.test(value)) {
    return undefined;
  }
  const port = Number(value);
  return port >= 1 && port <= 65535 ? port : undefined;
}

/**
 * Parses tab-separated `ID, Names, exposed-port, exposed-fqdn` lines.
 *
 * Each line is split into at most four fields, so a stray tab can only end up
 * in the hostname field, where it fails validation. Hostnames are normalized
 * the way TLS server names are, so `App.Example.com.` routes `app.example.com`.
 */
export function parseContainerList(output: string): ContainerListParseResult {
  const backends: BackendDescriptor[] = [];
  const rejected: RejectedLine[] = [];

  for (const rawLine of output.split('\n')) {
    const line = rawLine.replace(/\r$/, '');
    if (line.trim() === '') {
      continue;
    }

    const parts = splitFields(line, '\t', 4);
    if (parts.length !== 4) {
      rejected.push({ line, reason: 'expected 4 tab-separated fields' });
      continue;
    }

    const [id, rawName, rawPort, rawFqdn] = parts;
    const name = rawName.replace(/^\//, '');
    const fqdn = normalizeDnsName(rawFqdn);
    const portLabel = rawPort.trim();

    if (!id || !name || !portLabel || !fqdn) {
      rejected.push({ line, reason: 'missing required field' });
      continue;
    }

    if (!isValidContainerId(id)) {
      rejected.push({ line, reason: `invalid container id "${id}"` });
      continue;
    }

    const port = parsePortLabel(portLabel);
    if (port === undefined) {
      rejected.push({ line, reason: `invalid exposed-port "${portLabel}"` });
      continue;
    }

    if (!isValidDomain(fqdn) || !isSafeFqdn(fqdn)) {
      rejected.push({ line, reason: `invalid exposed-fqdn "${fqdn}"` });
      continue;
    }

    backends.push({ id, name, fqdn, port });
  }

  return { backends, rejected };
}

/**
 * Picks one address among a container's network attachments.
 *
 * Attachments without an address are ignored. Among the rest, the one whose
 * network name sorts first (by code point) wins, so the choice never depends
 * on the key order of the inspect output.
 */
export function selectAddress(networks: NetworkAttachments | null | undefined): string | undefined {
  if (!networks) {
    return undefined;
  }

  const candidates = Object.keys(networks)
    .sort()
    .map((name) => networks[name]?.IPAddress)
    .filter((address): address is string => typeof address === 'string' && address.trim() !== '');

  return candidates.length > 0 ? candidates[0].trim() : undefined;
}

function splitFields(line: string, separator: string, limit: number): string[] {
  const parts: string[] = [];
  let rest = line;
  while (parts.length < limit - 1) {
    const index = rest.indexOf(separator);
    if (index === -1) {
      break;
    }
    parts.push(rest.slice(0, index));
    rest = rest.slice(index + separator.length);
  }
  parts.push(rest);
  return parts;
}
