/**
 * Destination -> next hop table
 *
 * Attached routes are derived from the topology graph; static routes are
 * installed by hand and survive recomputation.
 */

import type { LinkGraph } from '../../graph/link-graph.js';
import type { RouteEntry } from './types.js';

export class RoutingTable {
  private routes = new Map<number, RouteEntry>();

  get size(): number {
    return this.routes.size;
  }

  get(destination: number): RouteEntry | undefined {
    return this.routes.get(destination);
  }

  has(destination: number): boolean {
    return this.routes.has(destination);
  }

  /**
   * Install a static route, replacing any existing entry
   */
  setRoute(destination: number, nextHop: number, hopCount: number = 1): RouteEntry {
    const entry: RouteEntry = {
      destination,
      nextHop,
      hopCount,
      origin: 'static',
      lastUpdate: Date.now(),
    };
    this.routes.set(destination, entry);
    return entry;
  }

  removeRoute(destination: number): boolean {
    return this.routes.delete(destination);
  }

  /**
   * Rebuild attached routes from shortest paths starting at `origin`.
   * Hosts with no path get no entry. Returns the number of attached routes.
   */
  computeFrom(graph: LinkGraph, origin: string): number {
    for (const [destination, entry] of this.routes) {
      if (entry.origin === 'attached') {
        this.routes.delete(destination);
      }
    }

    const now = Date.now();
    let computed = 0;

    graph.forEachHost((id, address) => {
      if (this.routes.get(address)?.origin === 'static') {
        return;
      }

      const path = graph.findPath(origin, id);
      if (path.length < 2) {
        return;
      }

      const nextNode = graph.getNode(path[1]);
      if (nextNode?.kind !== 'host') {
        return;
      }

      this.routes.set(address, {
        destination: address,
        nextHop: nextNode.address,
        hopCount: path.length - 1,
        origin: 'attached',
        lastUpdate: now,
      });
      computed++;
    });

    return computed;
  }

  entries(): RouteEntry[] {
    return Array.from(this.routes.values());
  }

  clear(): void {
    this.routes.clear();
  }
}
