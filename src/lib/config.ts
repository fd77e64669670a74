import fs from 'fs/promises';
import yaml from 'js-yaml';
import { getConfigPath } from './dirs';
import { isRecord } from './json';
import { LogLevel, isLogLevel, logger } from './logger';
import { errorMessage } from './result';
import { InterfaceKind } from './network/types';

export type NeighborSourceName = 'ip' | 'proc';

export interface AppConfig {
  logLevel: LogLevel;
  /** `ip` runs `ip -j neigh`; `proc` reads /proc/net/arp (IPv4 only). */
  neighborSource: NeighborSourceName;
  commandTimeoutMs: number;
  resolveHostnames: boolean;
  lookupTimeoutMs: number;
  vendorLookup: boolean;
  ouiPath?: string;
  hiddenInterfaces: string[];
  interfaceKinds: Record<string, InterfaceKind>;
}

export const DEFAULT_CONFIG: AppConfig = {
  logLevel: 'warn',
  neighborSource: 'ip',
  commandTimeoutMs: 2000,
  resolveHostnames: false,
  lookupTimeoutMs: 500,
  vendorLookup: true,
  hiddenInterfaces: [],
  interfaceKinds: {},
};

const INTERFACE_KINDS: readonly InterfaceKind[] = ['ethernet', 'wifi', 'loopback', 'other'];

function isInterfaceKind(value: unknown): value is InterfaceKind {
  return typeof value === 'string' && (INTERFACE_KINDS as readonly string[]).includes(value);
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

function ignored(key: string, value: unknown) {
  logger.warn('Config', `Ignoring invalid value for "${key}": ${JSON.stringify(value)}`);
}

/**
 * Overlays the recognised keys of a parsed config file on the defaults.
 * Unknown keys are skipped; invalid values keep their default.
 */
export function normalizeConfig(raw: unknown): AppConfig {
  const config: AppConfig = {
    ...DEFAULT_CONFIG,
    hiddenInterfaces: [...DEFAULT_CONFIG.hiddenInterfaces],
    interfaceKinds: { ...DEFAULT_CONFIG.interfaceKinds },
  };
  if (!isRecord(raw)) {
    if (raw !== undefined) ignored('<root>', raw);
    return config;
  }

  if (raw.logLevel !== undefined) {
    if (isLogLevel(raw.logLevel)) config.logLevel = raw.logLevel;
    else ignored('logLevel', raw.logLevel);
  }
  if (raw.neighborSource !== undefined) {
    if (raw.neighborSource === 'ip' || raw.neighborSource === 'proc') config.neighborSource = raw.neighborSource;
    else ignored('neighborSource', raw.neighborSource);
  }
  if (raw.commandTimeoutMs !== undefined) {
    if (isPositiveInteger(raw.commandTimeoutMs)) config.commandTimeoutMs = raw.commandTimeoutMs;
    else ignored('commandTimeoutMs', raw.commandTimeoutMs);
  }
  if (raw.lookupTimeoutMs !== undefined) {
    if (isPositiveInteger(raw.lookupTimeoutMs)) config.lookupTimeoutMs = raw.lookupTimeoutMs;
    else ignored('lookupTimeoutMs', raw.lookupTimeoutMs);
  }
  if (raw.resolveHostnames !== undefined) {
    if (typeof raw.resolveHostnames === 'boolean') config.resolveHostnames = raw.resolveHostnames;
    else ignored('resolveHostnames', raw.resolveHostnames);
  }
  if (raw.vendorLookup !== undefined) {
    if (typeof raw.vendorLookup === 'boolean') config.vendorLookup = raw.vendorLookup;
    else ignored('vendorLookup', raw.vendorLookup);
  }
  if (raw.ouiPath !== undefined) {
    if (typeof raw.ouiPath === 'string' && raw.ouiPath !== '') config.ouiPath = raw.ouiPath;
    else ignored('ouiPath', raw.ouiPath);
  }
  if (raw.hiddenInterfaces !== undefined) {
    const hidden = raw.hiddenInterfaces;
    if (Array.isArray(hidden) && hidden.every((name): name is string => typeof name === 'string')) {
      config.hiddenInterfaces = hidden;
    } else {
      ignored('hiddenInterfaces', hidden);
    }
  }
  if (raw.interfaceKinds !== undefined) {
    if (isRecord(raw.interfaceKinds)) {
      for (const [name, kind] of Object.entries(raw.interfaceKinds)) {
        if (isInterfaceKind(kind)) config.interfaceKinds[name] = kind;
        else ignored(`interfaceKinds.${name}`, kind);
      }
    } else {
      ignored('interfaceKinds', raw.interfaceKinds);
    }
  }

  return config;
}

function isMissingFile(e: unknown): boolean {
  return isRecord(e) && e.code === 'ENOENT';
}

/**
 * Reads the YAML config file (plain JSON is valid YAML too). A missing or
 * empty file means defaults; an unreadable or malformed one is reported and
 * also falls back to defaults, since the probe must print something on every
 * run.
 */
export async function getConfig(configPath: string = getConfigPath()): Promise<AppConfig> {
  let content: string;
  try {
    content = await fs.readFile(configPath, 'utf-8');
  } catch (e) {
    if (!isMissingFile(e)) {
      logger.warn('Config', `Cannot read ${configPath}: ${errorMessage(e)}`);
    }
    return normalizeConfig(undefined);
  }

  try {
    return normalizeConfig(yaml.load(content));
  } catch (e) {
    logger.warn('Config', `Malformed config ${configPath}: ${errorMessage(e)}`);
    return normalizeConfig(undefined);
  }
}
