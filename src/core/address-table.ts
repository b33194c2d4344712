/**
 * Host registry plus the routing table used to resolve destinations
 */

import { isBroadcast, isHostAddress } from './addressing.js';
import {
  AddressRangeError,
  DuplicateAddressError,
  RoutingInconsistencyError,
  UnknownHostError,
} from './errors.js';
import type { Host } from './host.js';
import { RoutingTable } from './routing/routing-table.js';
import { LinkGraph, ROUTER_NODE_ID, hostNodeId } from '../graph/link-graph.js';

export class AddressTable {
  readonly routingTable: RoutingTable;
  private readonly topology: LinkGraph;
  private readonly hosts = new Map<number, Host>();
  // Addresses are never handed out twice within a router's lifetime
  private readonly retired = new Set<number>();

  constructor() {
    this.routingTable = new RoutingTable();
    this.topology = new LinkGraph();
    this.topology.addRouter(ROUTER_NODE_ID);
  }

  get size(): number {
    return this.hosts.size;
  }

  register(host: Host): void {
    const { address } = host;
    if (!isHostAddress(address)) {
      throw new AddressRangeError(address);
    }
    if (this.hosts.has(address) || this.retired.has(address)) {
      throw new DuplicateAddressError(address, this.retired.has(address));
    }

    this.hosts.set(address, host);
    this.topology.attachHost(address);
    this.refreshRoutes();
  }

  /**
   * Remove a host; its address stays retired
   */
  unregister(address: number): boolean {
    if (!this.hosts.delete(address)) {
      return false;
    }
    this.retired.add(address);
    this.topology.removeNode(hostNodeId(address));
    this.refreshRoutes();
    return true;
  }

  /**
   * Bring a host's segment up or down. Routes are recomputed at once, so a
   * host behind a down segment stops resolving until it comes back up.
   */
  setSegmentState(address: number, up: boolean): void {
    this.requireKnown(address);
    this.topology.setSegmentState(ROUTER_NODE_ID, hostNodeId(address), up);
    this.refreshRoutes();
  }

  has(address: number): boolean {
    return this.hosts.has(address);
  }

  get(address: number): Host | undefined {
    return this.hosts.get(address);
  }

  requireKnown(address: number): Host {
    const host = this.hosts.get(address);
    if (!host) {
      throw new UnknownHostError(address);
    }
    return host;
  }

  /**
   * Hosts in registration order
   */
  getHosts(): Host[] {
    return Array.from(this.hosts.values());
  }

  /**
   * Broadcast resolves to every host the routing table reaches, unicast to
   * the next hop the routing table names for the destination
   */
  resolveTargets(dst: number): Host[] {
    if (isBroadcast(dst)) {
      return this.getHosts().filter((host) => this.routingTable.has(host.address));
    }

    const route = this.routingTable.get(dst);
    if (!route) {
      throw new UnknownHostError(dst, `Unknown destination host ${dst}`);
    }

    const nextHop = this.hosts.get(route.nextHop);
    if (!nextHop) {
      throw new RoutingInconsistencyError(dst, route.nextHop);
    }
    return [nextHop];
  }

  private refreshRoutes(): void {
    this.routingTable.computeFrom(this.topology, ROUTER_NODE_ID);
  }
}
