import { InterfaceName, IpAddress, MacAddress } from '../../src/lib/network/addresses';
import { InterfaceSource, RawInterface } from '../../src/lib/network/interfaces';
import { NeighborSource, RawNeighbor } from '../../src/lib/network/neighbors';
import { Interface, InterfaceKind, NeighborEntry, NeighborState, OperState } from '../../src/lib/network/types';

export function name(raw: string): InterfaceName {
  const parsed = InterfaceName.parse(raw);
  if (!parsed.success) throw new Error(parsed.error.message);
  return parsed.value;
}

export function ip(raw: string): IpAddress {
  const parsed = IpAddress.parse(raw);
  if (!parsed.success) throw new Error(parsed.error.message);
  return parsed.value;
}

export function mac(raw: string): MacAddress {
  const parsed = MacAddress.parse(raw);
  if (!parsed.success) throw new Error(parsed.error.message);
  return parsed.value;
}

export function iface(
  ifName: string,
  options: { kind?: InterfaceKind; operState?: OperState; addresses?: string[] } = {},
): Interface {
  return {
    name: name(ifName),
    kind: options.kind ?? 'ethernet',
    operState: options.operState ?? 'up',
    addresses: (options.addresses ?? []).map(ip),
  };
}

export function neighbor(ifName: string, address: string, state: NeighborState, hw?: string): NeighborEntry {
  return {
    interface: name(ifName),
    ip: ip(address),
    mac: hw ? mac(hw) : undefined,
    state,
  };
}

/** In-process interface table. `null` makes the table unreadable. */
export class FakeInterfaceSource implements InterfaceSource {
  readonly name = 'fake interfaces';

  constructor(private rows: RawInterface[] | null) {}

  async readInterfaces(): Promise<RawInterface[]> {
    if (this.rows === null) throw new Error('EACCES: permission denied, scandir \'/sys/class/net\'');
    return this.rows;
  }
}

/** In-process neighbor tables keyed by interface; missing keys reject. */
export class FakeNeighborSource implements NeighborSource {
  readonly name = 'fake neighbors';
  readonly calls: string[] = [];

  constructor(private tables: Record<string, RawNeighbor[]>) {}

  async readNeighbors(interfaceName: string): Promise<RawNeighbor[]> {
    this.calls.push(interfaceName);
    const rows = this.tables[interfaceName];
    if (!rows) throw new Error(`Cannot find device "${interfaceName}"`);
    return rows;
  }
}
