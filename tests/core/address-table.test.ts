import { describe, it, expect } from 'vitest';
import { AddressTable } from '@/core/address-table';
import {
  AddressRangeError,
  DuplicateAddressError,
  RoutingInconsistencyError,
  UnknownHostError,
} from '@/core/errors';
import { Host, type HostTransport } from '@/core/host';

const transport: HostTransport = { send: async () => {} };

function tableWith(...addresses: number[]): AddressTable {
  const table = new AddressTable();
  for (const address of addresses) {
    table.register(new Host(address, transport));
  }
  return table;
}

describe('AddressTable', () => {
  describe('register', () => {
    it('should add the host with an identity route', () => {
      const table = tableWith(10);

      expect(table.has(10)).toBe(true);
      expect(table.size).toBe(1);
      expect(table.routingTable.get(10)).toMatchObject({
        destination: 10,
        nextHop: 10,
        hopCount: 1,
        origin: 'attached',
      });
    });

    it('should reject addresses outside 0-254', () => {
      const table = new AddressTable();

      expect(() => table.register(new Host(255, transport))).toThrow(AddressRangeError);
      expect(() => table.register(new Host(-1, transport))).toThrow(AddressRangeError);
    });

    it('should reject a duplicate address', () => {
      const table = tableWith(10);

      expect(() => table.register(new Host(10, transport))).toThrow(DuplicateAddressError);
      expect(() => table.register(new Host(10, transport))).toThrow('Host 10 already registered');
    });

    it('should refuse to reuse a retired address', () => {
      const table = tableWith(10);
      table.unregister(10);

      expect(() => table.register(new Host(10, transport))).toThrow(
        'Host address 10 was retired and cannot be reused'
      );
    });
  });

  describe('unregister', () => {
    it('should drop the host and its route', () => {
      const table = tableWith(10, 20);

      expect(table.unregister(10)).toBe(true);
      expect(table.has(10)).toBe(false);
      expect(table.routingTable.has(10)).toBe(false);
      expect(table.routingTable.has(20)).toBe(true);
    });

    it('should return false for an unknown address', () => {
      expect(new AddressTable().unregister(5)).toBe(false);
    });
  });

  describe('setSegmentState', () => {
    it('should drop the route as soon as the segment goes down', () => {
      const table = tableWith(1, 2);

      table.setSegmentState(2, false);

      expect(table.routingTable.has(2)).toBe(false);
      expect(() => table.resolveTargets(2)).toThrow('Unknown destination host 2');
      expect(table.resolveTargets(255).map((host) => host.address)).toEqual([1]);
    });

    it('should keep the segment down across unrelated registrations', () => {
      const table = tableWith(1, 2);
      table.setSegmentState(2, false);

      table.register(new Host(3, transport));

      expect(table.routingTable.has(2)).toBe(false);
      expect(table.routingTable.has(3)).toBe(true);
    });

    it('should restore the route when the segment comes back up', () => {
      const table = tableWith(1, 2);
      table.setSegmentState(2, false);
      table.setSegmentState(2, true);

      expect(table.resolveTargets(2).map((host) => host.address)).toEqual([2]);
    });

    it('should reject an unregistered host', () => {
      expect(() => tableWith(1).setSegmentState(9, false)).toThrow(UnknownHostError);
    });
  });

  describe('requireKnown', () => {
    it('should return the registered host', () => {
      const table = tableWith(7);

      expect(table.requireKnown(7).address).toBe(7);
    });

    it('should throw UnknownHostError otherwise', () => {
      expect(() => new AddressTable().requireKnown(7)).toThrow(UnknownHostError);
    });
  });

  describe('resolveTargets', () => {
    it('should resolve unicast to the destination host', () => {
      const table = tableWith(1, 2, 3);

      expect(table.resolveTargets(2).map((host) => host.address)).toEqual([2]);
    });

    it('should resolve broadcast to every host in registration order', () => {
      const table = tableWith(3, 1, 2);

      expect(table.resolveTargets(255).map((host) => host.address)).toEqual([3, 1, 2]);
    });

    it('should resolve broadcast to nothing on an empty table', () => {
      expect(new AddressTable().resolveTargets(255)).toEqual([]);
    });

    it('should reject a destination without a route', () => {
      expect(() => tableWith(1).resolveTargets(9)).toThrow('Unknown destination host 9');
    });

    it('should detect a route pointing at a missing host', () => {
      const table = tableWith(1, 2);
      table.routingTable.setRoute(2, 7);

      expect(() => table.resolveTargets(2)).toThrow(RoutingInconsistencyError);
      expect(() => table.resolveTargets(2)).toThrow('Route to 2 points to missing host 7');
    });
  });
});
