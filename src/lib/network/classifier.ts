import { ClassifiedInterface, ClassifiedSnapshot, Health, Interface, InterfaceWarning, NeighborEntry, NetworkSnapshot } from './types';

export const HEALTH_SEVERITY: Readonly<Record<Health, number>> = {
  healthy: 0,
  empty: 1,
  degraded: 2,
  unreachable: 3,
};

export function classifyInterface(
  iface: Interface,
  neighbors: NeighborEntry[],
  warning?: InterfaceWarning,
): Health {
  if (iface.operState === 'down') return 'unreachable';
  if (warning) return 'unreachable';
  if (neighbors.length === 0) return 'empty';
  if (neighbors.every(n => n.state === 'reachable')) return 'healthy';
  return 'degraded';
}

export function classify(snapshot: NetworkSnapshot): ClassifiedSnapshot {
  const interfaces: ClassifiedInterface[] = snapshot.interfaces.map(iface => {
    const key = iface.name.value;
    const neighbors = snapshot.neighborsByInterface.get(key) ?? [];
    const warning = snapshot.warnings.get(key);
    return {
      interface: iface,
      health: classifyInterface(iface, neighbors, warning),
      neighbors,
      warning,
    };
  });
  return { snapshot, interfaces };
}

/** Most severe health of the list, `undefined` for an empty list. */
export function worstHealth(healths: Health[]): Health | undefined {
  let worst: Health | undefined;
  for (const health of healths) {
    if (worst === undefined || HEALTH_SEVERITY[health] > HEALTH_SEVERITY[worst]) {
      worst = health;
    }
  }
  return worst;
}
