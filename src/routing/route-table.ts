import type { Route, RouteTableDiff } from './interfaces';

/**
 * Immutable hostname → backend snapshot.
 *
 * Instances are never modified after construction; the reconciler builds a new
 * table and swaps the reference, so a reader holding a table always sees it whole.
 */
export class RouteTable {
  private static readonly EMPTY = new RouteTable(new Map());

  private constructor(private readonly entries: ReadonlyMap<string, Route>) {
    Object.freeze(this);
  }

  static empty(): RouteTable {
    return RouteTable.EMPTY;
  }

  /**
   * @throws {Error} If two routes share a hostname.
   */
  static fromRoutes(routes: Iterable<Route>): RouteTable {
    const entries = new Map<string, Route>();
    for (const route of routes) {
      if (entries.has(route.fqdn)) {
        throw new Error(`Duplicate route for ${route.fqdn}`);
      }
      entries.set(
        route.fqdn,
        Object.freeze({ fqdn: route.fqdn, targetAddress: route.targetAddress, targetPort: route.targetPort }),
      );
    }
    return entries.size === 0 ? RouteTable.EMPTY : new RouteTable(entries);
  }

  get size(): number {
    return this.entries.size;
  }

  get(fqdn: string): Route | undefined {
    return this.entries.get(fqdn);
  }

  has(fqdn: string): boolean {
    return this.entries.has(fqdn);
  }

  fqdns(): string[] {
    return [...this.entries.keys()].sort();
  }

  routes(): Route[] {
    return this.fqdns().map((fqdn) => this.entries.get(fqdn)).filter((route): route is Route => route !== undefined);
  }

  /**
   * Compares against an older table by address and port per hostname.
   */
  diff(previous: RouteTable): RouteTableDiff {
    const added: string[] = [];
    const changed: string[] = [];
    const removed: string[] = [];

    for (const fqdn of this.fqdns()) {
      const before = previous.get(fqdn);
      if (!before) {
        added.push(fqdn);
      } else if (!sameTarget(before, this.entries.get(fqdn))) {
        changed.push(fqdn);
      }
    }

    for (const fqdn of previous.fqdns()) {
      if (!this.entries.has(fqdn)) {
        removed.push(fqdn);
      }
    }

    return { added, changed, removed };
  }

  equals(other: RouteTable): boolean {
    if (other === this) {
      return true;
    }
    const { added, changed, removed } = this.diff(other);
    return added.length === 0 && changed.length === 0 && removed.length === 0;
  }
}

function sameTarget(a: Route, b: Route | undefined): boolean {
  return b !== undefined && a.targetAddress === b.targetAddress && a.targetPort === b.targetPort;
}
