import type { BackendDescriptor } from '../../discovery/interfaces';
import type { RouteTable } from '../route-table';

/**
 * Forwarding target for one hostname.
 */
export interface Route {
  readonly fqdn: string;
  readonly targetAddress: string;
  readonly targetPort: number;
}

/**
 * Hostnames that differ between two route tables.
 */
export interface RouteTableDiff {
  added: string[];
  changed: string[];
  removed: string[];
}

/**
 * Read side of the route table, used on the request path.
 */
export interface RouteResolver {
  resolve(host: string): Route | undefined;
}

/**
 * What the reconciler needs from certificate management.
 */
export interface CertificateEnsurer {
  /** Obtains or renews when needed. Never rejects. */
  ensure(fqdn: string): Promise<void>;
  /** Whether a routed hostname without changes still needs an `ensure`. */
  isDue(fqdn: string): boolean;
  /** The hostname is no longer routed. */
  release(fqdn: string): void;
}

export interface DroppedBackend {
  backend: BackendDescriptor;
  reason: string;
}

export type ReconcileStatus = 'published' | 'unchanged' | 'discovery-failed';

export interface ReconcileResult extends RouteTableDiff {
  status: ReconcileStatus;
  /** The table that is published once the cycle is over. */
  table: RouteTable;
  dropped: DroppedBackend[];
}
