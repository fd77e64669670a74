import { InterfaceName, IpAddress, MacAddress } from './addresses';

export type InterfaceKind = 'ethernet' | 'wifi' | 'loopback' | 'other';

export type OperState = 'up' | 'down' | 'unknown';

export type NeighborState = 'reachable' | 'stale' | 'failed' | 'unknown';

export type Health = 'healthy' | 'degraded' | 'empty' | 'unreachable';

export type DeviceType =
  | 'television'
  | 'printer'
  | 'router'
  | 'computer'
  | 'nas'
  | 'mobile'
  | 'tablet'
  | 'speaker'
  | 'streaming'
  | 'smart-home'
  | 'unknown';

export interface DeviceIdentity {
  type: DeviceType;
  /** OUI vendor, or a brand recognised in the hostname. */
  manufacturer?: string;
}

export interface Interface {
  name: InterfaceName;
  kind: InterfaceKind;
  operState: OperState;
  addresses: IpAddress[];
  mac?: MacAddress;
}

export interface NeighborEntry {
  interface: InterfaceName;
  ip: IpAddress;
  mac?: MacAddress;
  state: NeighborState;
  // Best-effort enrichment, filled after the snapshot is built
  hostname?: string;
  vendor?: string;
  identity?: DeviceIdentity;
}

export interface CollectionError {
  kind: 'SourceUnavailable';
  source: string;
  message: string;
}

export function sourceUnavailable(source: string, message: string): CollectionError {
  return { kind: 'SourceUnavailable', source, message };
}

export interface InterfaceWarning {
  interface: InterfaceName;
  lookupFailure: CollectionError;
}

export interface NetworkSnapshot {
  /** Sorted by name. */
  interfaces: Interface[];
  /** Keyed by interface name; every interface has an entry, sorted by ip. */
  neighborsByInterface: Map<string, NeighborEntry[]>;
  /** Interfaces whose neighbor lookup failed, keyed by interface name. */
  warnings: Map<string, InterfaceWarning>;
  gateway?: IpAddress;
  dnsServers: IpAddress[];
}

export interface ClassifiedInterface {
  interface: Interface;
  health: Health;
  neighbors: NeighborEntry[];
  warning?: InterfaceWarning;
}

export interface ClassifiedSnapshot {
  snapshot: NetworkSnapshot;
  /** Same order as `snapshot.interfaces`. */
  interfaces: ClassifiedInterface[];
}

export interface RenderResult {
  text: string;
  tooltip: string;
  alt: string;
  classes: string[];
}
