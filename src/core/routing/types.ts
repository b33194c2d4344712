/**
 * Routing table entries
 */

export type RouteOrigin = 'attached' | 'static';

export interface RouteEntry {
  destination: number;
  nextHop: number;
  hopCount: number;
  origin: RouteOrigin; // attached routes are rebuilt from the topology
  lastUpdate: number;
}
