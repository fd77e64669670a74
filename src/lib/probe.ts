import { AppConfig } from './config';
import { Executor } from './executor';
import { logger } from './logger';
import { errorMessage } from './result';
import { RenderOptions, render, renderError } from './display/waybar';
import { IpAddress } from './network/addresses';
import { classify } from './network/classifier';
import { identifyDevices } from './network/identity';
import { readDefaultGateway, readDnsServers } from './network/gateway';
import { resolveHostname } from './network/hostnames';
import { InterfaceCollector, SysfsInterfaceSource } from './network/interfaces';
import { IpNeighborSource, NeighborCollector, NeighborSource, ProcArpSource } from './network/neighbors';
import { buildSnapshot } from './network/snapshot';
import { NetworkSnapshot, NeighborEntry, RenderResult } from './network/types';
import { VendorLookup, loadVendorLookup } from './network/vendor';

export interface ProbeDependencies {
  interfaces: InterfaceCollector;
  neighbors: NeighborCollector;
  gateway?: () => Promise<IpAddress | undefined>;
  dnsServers?: () => Promise<IpAddress[]>;
  vendor?: VendorLookup;
  resolveHostname?: (ip: IpAddress) => Promise<string | undefined>;
  renderOptions?: RenderOptions;
}

/** Runs one enrichment step; a rejection is logged and replaced by `fallback`. */
async function bestEffort<T>(what: string, fallback: T, task?: () => Promise<T>): Promise<T> {
  if (!task) return fallback;
  try {
    return await task();
  } catch (e) {
    logger.warn('Enrich', `Skipping ${what}: ${errorMessage(e)}`);
    return fallback;
  }
}

export async function enrichSnapshot(
  snapshot: NetworkSnapshot,
  vendor?: VendorLookup,
  resolve?: (ip: IpAddress) => Promise<string | undefined>,
): Promise<NetworkSnapshot> {
  if (!vendor && !resolve) return snapshot;

  const enrich = async (entry: NeighborEntry): Promise<NeighborEntry> => {
    const enriched: NeighborEntry = { ...entry };
    if (vendor && entry.mac) enriched.vendor = vendor(entry.mac);
    if (resolve) {
      const lookup = resolve;
      enriched.hostname = await bestEffort<string | undefined>(`hostname of ${entry.ip}`, undefined, () => lookup(entry.ip));
    }
    return enriched;
  };

  const lists = [...snapshot.neighborsByInterface.entries()];
  const enrichedLists = await Promise.all(lists.map(([, entries]) => Promise.all(entries.map(enrich))));
  const neighborsByInterface = new Map<string, NeighborEntry[]>(
    lists.map(([name], i): [string, NeighborEntry[]] => [name, enrichedLists[i]]),
  );
  return { ...snapshot, neighborsByInterface };
}

/**
 * One full run: collect → build → enrich → identify → classify → render.
 * Always resolves to a well-formed result; only an unreadable interface table
 * (or an unexpected exception) turns into an error rendering. Enrichment
 * failures only drop the detail they would have added.
 */
export async function runProbe(deps: ProbeDependencies): Promise<RenderResult> {
  try {
    const interfaces = await deps.interfaces.listInterfaces();
    if (!interfaces.success) {
      return renderError('Unable to enumerate network interfaces', interfaces.error);
    }

    const [gateway, dnsServers] = await Promise.all([
      bestEffort<IpAddress | undefined>('default gateway', undefined, deps.gateway),
      bestEffort<IpAddress[]>('DNS servers', [], deps.dnsServers),
    ]);

    const snapshot = await buildSnapshot(
      interfaces.value,
      name => deps.neighbors.listNeighbors(name),
      { gateway, dnsServers },
    );
    const enriched = identifyDevices(await enrichSnapshot(snapshot, deps.vendor, deps.resolveHostname));
    const classified = classify(enriched);

    for (const entry of classified.interfaces) {
      logger.debug('Probe', `${entry.interface.name}: ${entry.health} (${entry.neighbors.length} neighbors)`);
    }
    return render(classified, deps.renderOptions);
  } catch (e) {
    logger.error('Probe', 'Unexpected failure while building the snapshot', e);
    return renderError('Unable to build network snapshot', e);
  }
}

export function createNeighborSource(config: AppConfig, executor: Executor): NeighborSource {
  return config.neighborSource === 'proc'
    ? new ProcArpSource(executor)
    : new IpNeighborSource(executor, config.commandTimeoutMs);
}

/** Wires the Linux sources and the enrichment the config asks for. */
export async function createProbeDependencies(config: AppConfig, executor: Executor): Promise<ProbeDependencies> {
  return {
    interfaces: new InterfaceCollector(new SysfsInterfaceSource(executor), { kindOverrides: config.interfaceKinds }),
    neighbors: new NeighborCollector(createNeighborSource(config, executor)),
    gateway: () => readDefaultGateway(executor),
    dnsServers: () => readDnsServers(executor),
    vendor: config.vendorLookup ? await loadVendorLookup(executor, config.ouiPath) : undefined,
    resolveHostname: config.resolveHostnames
      ? ip => resolveHostname(ip, config.lookupTimeoutMs)
      : undefined,
    renderOptions: { hiddenInterfaces: config.hiddenInterfaces },
  };
}
