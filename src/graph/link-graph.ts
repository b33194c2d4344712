/**
 * Attachment topology of the network: which hosts hang off which router
 * segment. Wraps ngraph.graph; shortest paths come from ngraph.path.
 *
 * With a single shared medium every host is one segment away from the
 * router, but routes are still derived from this graph so a multi-segment
 * layout only needs more nodes and links.
 */

import createGraph, { type Graph, type Link } from 'ngraph.graph';
import { nba, type PathFinder } from 'ngraph.path';

export const ROUTER_NODE_ID = 'router';

export type TopologyNode =
  | { kind: 'router' }
  | { kind: 'host'; address: number };

export interface SegmentData {
  cost: number; // path weight, e.g. cable length
  up: boolean; // a down segment is skipped by path finding
}

export function hostNodeId(address: number): string {
  return `host:${address}`;
}

export class LinkGraph {
  private graph: Graph<TopologyNode, SegmentData>;
  private pathFinder: PathFinder<TopologyNode> | undefined;
  private pathFinderDirty: boolean = true;

  constructor() {
    this.graph = createGraph<TopologyNode, SegmentData>();
  }

  addRouter(id: string = ROUTER_NODE_ID): void {
    this.graph.addNode(id, { kind: 'router' });
    this.pathFinderDirty = true;
  }

  /**
   * Add a host node and attach it to a router with one segment
   */
  attachHost(address: number, routerId: string = ROUTER_NODE_ID, cost: number = 1): string {
    const id = hostNodeId(address);
    this.graph.addNode(id, { kind: 'host', address });
    this.setSegment(routerId, id, { cost, up: true });
    return id;
  }

  /**
   * Remove a node together with its segments
   */
  removeNode(id: string): boolean {
    const removed = this.graph.removeNode(id);
    if (removed) {
      this.pathFinderDirty = true;
    }
    return removed;
  }

  hasNode(id: string): boolean {
    return this.graph.hasNode(id) !== undefined;
  }

  getNode(id: string): TopologyNode | undefined {
    return this.graph.getNode(id)?.data;
  }

  setSegment(from: string, to: string, data: SegmentData): void {
    const existing = this.findLink(from, to);
    if (existing) {
      this.graph.removeLink(existing);
    }
    this.graph.addLink(from, to, data);
    this.pathFinderDirty = true;
  }

  /**
   * Segments are undirected: either endpoint order finds the same one
   */
  getSegment(from: string, to: string): SegmentData | undefined {
    return this.findLink(from, to)?.data;
  }

  /**
   * Mark a segment up or down without removing it
   */
  setSegmentState(from: string, to: string, up: boolean): boolean {
    const segment = this.getSegment(from, to);
    if (!segment) {
      return false;
    }
    this.setSegment(from, to, { ...segment, up });
    return true;
  }

  /**
   * Cheapest path over segments that are up, as node IDs from `from` to `to`.
   * Empty when either node is missing or no path exists.
   */
  findPath(from: string, to: string): string[] {
    if (!this.hasNode(from) || !this.hasNode(to)) {
      return [];
    }

    if (this.pathFinderDirty || !this.pathFinder) {
      this.pathFinder = nba<TopologyNode, SegmentData>(this.graph, {
        oriented: false,
        distance: (_fromNode, _toNode, link) => link.data.cost,
        blocked: (_fromNode, _toNode, link) => !link.data.up,
      });
      this.pathFinderDirty = false;
    }

    // ngraph.path lists the path from destination back to source
    return this.pathFinder
      .find(from, to)
      .map((node) => String(node.id))
      .reverse();
  }

  /**
   * Iterate over host nodes with their addresses
   */
  forEachHost(callback: (id: string, address: number) => void): void {
    this.graph.forEachNode((node) => {
      if (node.data.kind === 'host') {
        callback(String(node.id), node.data.address);
      }
    });
  }

  private findLink(from: string, to: string): Link<SegmentData> | undefined {
    return this.graph.getLink(from, to) ?? this.graph.getLink(to, from) ?? undefined;
  }

  getNodeCount(): number {
    return this.graph.getNodeCount();
  }

  getLinkCount(): number {
    return this.graph.getLinkCount();
  }

  clear(): void {
    this.graph.clear();
    this.pathFinder = undefined;
    this.pathFinderDirty = true;
  }
}
