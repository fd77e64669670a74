import { logger } from '../logger';
import { Result, errorMessage } from '../result';
import { InterfaceName, IpAddress } from './addresses';
import {
  CollectionError,
  Interface,
  InterfaceWarning,
  NeighborEntry,
  NetworkSnapshot,
  sourceUnavailable,
} from './types';

export type NeighborLookup = (name: InterfaceName) => Promise<Result<NeighborEntry[], CollectionError>>;

export interface SnapshotExtras {
  gateway?: IpAddress;
  dnsServers?: IpAddress[];
}

function ipKey(ip: IpAddress): string {
  return `${ip.family}/${ip.bytes.join('.')}`;
}

/**
 * Later rows win: neighbor tables list an address once per observation, so
 * the last row for an ip carries its most recent state.
 */
export function dedupeNeighbors(entries: NeighborEntry[]): NeighborEntry[] {
  const byIp = new Map<string, NeighborEntry>();
  for (const entry of entries) {
    byIp.set(ipKey(entry.ip), entry);
  }
  return [...byIp.values()].sort((a, b) => IpAddress.compare(a.ip, b.ip));
}

async function safeLookup(lookup: NeighborLookup, name: InterfaceName): Promise<Result<NeighborEntry[], CollectionError>> {
  try {
    return await lookup(name);
  } catch (e) {
    return { success: false, error: sourceUnavailable('neighbor lookup', errorMessage(e)) };
  }
}

/**
 * Merges the interface list with one neighbor lookup per interface. A failed
 * lookup only affects its own interface: it gets an empty neighbor list and a
 * warning, and the rest of the snapshot is built as usual.
 */
export async function buildSnapshot(
  interfaces: Interface[],
  lookup: NeighborLookup,
  extras: SnapshotExtras = {},
): Promise<NetworkSnapshot> {
  const seen = new Set<string>();
  const sorted = [...interfaces]
    .sort((a, b) => InterfaceName.compare(a.name, b.name))
    .filter(iface => {
      if (seen.has(iface.name.value)) {
        logger.warn('Snapshot', `Duplicate interface ${iface.name}, keeping the first`);
        return false;
      }
      seen.add(iface.name.value);
      return true;
    });

  // Fan out one lookup per interface; results are matched back by position
  const results = await Promise.all(sorted.map(iface => safeLookup(lookup, iface.name)));

  const neighborsByInterface = new Map<string, NeighborEntry[]>();
  const warnings = new Map<string, InterfaceWarning>();

  sorted.forEach((iface, index) => {
    const result = results[index];
    const key = iface.name.value;
    if (result.success) {
      // Rows reported under another interface are not ours to keep
      const own = result.value.filter(entry => entry.interface.equals(iface.name));
      neighborsByInterface.set(key, dedupeNeighbors(own));
    } else {
      neighborsByInterface.set(key, []);
      warnings.set(key, { interface: iface.name, lookupFailure: result.error });
    }
  });

  return {
    interfaces: sorted,
    neighborsByInterface,
    warnings,
    gateway: extras.gateway,
    dnsServers: [...(extras.dnsServers ?? [])].sort(IpAddress.compare),
  };
}
