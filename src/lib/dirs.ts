// src/lib/dirs.ts
import path from 'path';
import os from 'os';

export const APP_NAME = 'lan-glance';

export function getConfigDir(env: NodeJS.ProcessEnv = process.env): string {
  const base = env.XDG_CONFIG_HOME || path.join(os.homedir(), '.config');
  return path.join(base, APP_NAME);
}

export function getConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return env.LAN_GLANCE_CONFIG || path.join(getConfigDir(env), 'config.yaml');
}
