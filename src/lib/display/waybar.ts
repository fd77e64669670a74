import { isRecord } from '../json';
import { worstHealth } from '../network/classifier';
import { formatDeviceType } from '../network/identity';
import {
  ClassifiedInterface,
  ClassifiedSnapshot,
  Health,
  NeighborEntry,
  NeighborState,
  NetworkSnapshot,
  RenderResult,
} from '../network/types';

/**
 * The only color tokens the tooltip ever contains. Bar themes and scripts
 * that post-process the tooltip match on exactly these three opening tags.
 */
export const COLOR_TAGS = {
  green: "<span color='#00FF00'>",
  yellow: "<span color='#FFFF00'>",
  gray: "<span color='#888888'>",
} as const;

export type MarkupColor = keyof typeof COLOR_TAGS;

export const HEALTH_COLORS: Readonly<Record<Health, MarkupColor>> = {
  healthy: 'green',
  degraded: 'yellow',
  empty: 'gray',
  unreachable: 'gray',
};

export const STATE_COLORS: Readonly<Record<NeighborState, MarkupColor>> = {
  reachable: 'green',
  stale: 'yellow',
  failed: 'gray',
  unknown: 'gray',
};

export const ICON = '🖧';

/** Waybar's wire format: `classes` goes out under the key `class`. */
export interface WaybarOutput {
  text: string;
  tooltip: string;
  alt: string;
  class: string[];
}

export const FALLBACK_JSON = `{"text":"${ICON} --","tooltip":"Network status unavailable","alt":"error","class":["network","error"]}`;

export interface RenderOptions {
  /** Interface names never shown, in addition to loopback interfaces. */
  hiddenInterfaces?: string[];
}

export function escapeMarkup(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/'/g, '&#39;')
    .replace(/"/g, '&quot;');
}

export function colorize(color: MarkupColor, text: string): string {
  return `${COLOR_TAGS[color]}${escapeMarkup(text)}</span>`;
}

function isDisplayed(entry: ClassifiedInterface, hidden: ReadonlySet<string>): boolean {
  return entry.interface.kind !== 'loopback' && !hidden.has(entry.interface.name.value);
}

function pluralize(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

function neighborTags(neighbor: NeighborEntry, snapshot: NetworkSnapshot): string[] {
  const tags: string[] = [];
  if (snapshot.gateway?.equals(neighbor.ip)) tags.push('gateway');
  if (snapshot.dnsServers.some(dns => dns.equals(neighbor.ip))) tags.push('dns');
  return tags;
}

function formatNeighbor(neighbor: NeighborEntry, snapshot: NetworkSnapshot): string {
  const parts = [neighbor.ip.toString()];
  if (neighbor.mac) parts.push(neighbor.mac.toString());
  const manufacturer = neighbor.identity?.manufacturer ?? neighbor.vendor;
  if (manufacturer) parts.push(manufacturer);
  let label = parts.join(' ');
  if (neighbor.hostname) label += ` (${neighbor.hostname})`;
  const tags = neighborTags(neighbor, snapshot);
  if (tags.length > 0) label += ` [${tags.join(', ')}]`;
  if (neighbor.identity && neighbor.identity.type !== 'unknown') {
    label += ` ${formatDeviceType(neighbor.identity.type)}`;
  }
  return colorize(STATE_COLORS[neighbor.state], label);
}

/** `DNS: …` detail under the gateway, for resolvers other than the gateway itself. */
function formatGatewayDns(neighbor: NeighborEntry, snapshot: NetworkSnapshot): string | undefined {
  const gateway = snapshot.gateway;
  if (!gateway?.equals(neighbor.ip)) return undefined;
  const others = snapshot.dnsServers.filter(dns => !dns.equals(gateway));
  if (others.length === 0) return undefined;
  const entries = others.map(dns => `${dns} (${dns.isLocal() ? 'local' : 'external'})`);
  return colorize('gray', `DNS: ${entries.join(', ')}`);
}

function formatInterface(entry: ClassifiedInterface, snapshot: NetworkSnapshot): string[] {
  const { interface: iface, health, neighbors } = entry;
  const address = iface.addresses[0];
  const name = address ? `${iface.name} (${address})` : iface.name.toString();
  const lines = [colorize(HEALTH_COLORS[health], `${name}: ${health}, ${pluralize(neighbors.length, 'device')}`)];

  if (entry.warning) {
    lines.push(`  └─ ${colorize('gray', `neighbor table unavailable: ${entry.warning.lookupFailure.message}`)}`);
  } else if (neighbors.length === 0) {
    lines.push(`  └─ ${colorize('gray', 'No devices')}`);
  } else {
    neighbors.forEach((neighbor, i) => {
      const last = i === neighbors.length - 1;
      lines.push((last ? '  └─ ' : '  ├─ ') + formatNeighbor(neighbor, snapshot));
      const dns = formatGatewayDns(neighbor, snapshot);
      if (dns) lines.push((last ? '       ' : '  │    ') + dns);
    });
  }
  return lines;
}

/**
 * Renders a classified snapshot. Output depends only on the input: the
 * snapshot is already sorted, and nothing here reads the clock or the host.
 */
export function render(classified: ClassifiedSnapshot, options: RenderOptions = {}): RenderResult {
  const hidden = new Set(options.hiddenInterfaces ?? []);
  const displayed = classified.interfaces.filter(entry => isDisplayed(entry, hidden));

  const active = displayed.filter(entry => entry.health === 'healthy' || entry.health === 'degraded').length;
  const tooltip = displayed.length === 0
    ? 'No network interfaces found'
    : displayed.map(entry => formatInterface(entry, classified.snapshot).join('\n')).join('\n\n');
  const alt = worstHealth(displayed.map(entry => entry.health)) ?? 'empty';

  return {
    text: `${ICON} ${active}`,
    tooltip,
    alt,
    classes: ['network', alt],
  };
}

function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (isRecord(error) && typeof error.message === 'string') return error.message;
  return String(error);
}

export function renderError(context: string, error: unknown): RenderResult {
  return {
    text: `${ICON} --`,
    tooltip: `${escapeMarkup(context)}\n\nError: ${escapeMarkup(describeError(error))}`,
    alt: 'error',
    classes: ['network', 'error'],
  };
}

export function toWaybarOutput(result: RenderResult): WaybarOutput {
  return {
    text: result.text,
    tooltip: result.tooltip,
    alt: result.alt,
    class: [...result.classes],
  };
}

/** Never throws: a failed serialization degrades to {@link FALLBACK_JSON}. */
export function toWaybarJson(result: RenderResult): string {
  try {
    return JSON.stringify(toWaybarOutput(result));
  } catch {
    return FALLBACK_JSON;
  }
}
