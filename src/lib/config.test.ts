import { describe, it, expect, vi, beforeEach } from 'vitest';
import fs from 'fs/promises';
import { DEFAULT_CONFIG, getConfig, normalizeConfig } from './config';
import { getConfigPath } from './dirs';
import { logger } from './logger';

vi.mock('fs/promises', () => ({
    default: {
        readFile: vi.fn(),
    }
}));

describe('getConfig', () => {
    beforeEach(() => {
        vi.clearAllMocks();
        vi.spyOn(logger, 'warn').mockImplementation(() => undefined);
    });

    it('returns the defaults when no config file exists', async () => {
        vi.mocked(fs.readFile).mockRejectedValue(Object.assign(new Error('ENOENT: no such file or directory'), { code: 'ENOENT' }));

        const config = await getConfig('/home/test/.config/lan-glance/config.yaml');

        expect(config).toEqual(DEFAULT_CONFIG);
        expect(fs.readFile).toHaveBeenCalledWith('/home/test/.config/lan-glance/config.yaml', 'utf-8');
        expect(logger.warn).not.toHaveBeenCalled();
    });

    it('overlays values from the file on the defaults', async () => {
        vi.mocked(fs.readFile).mockResolvedValue(JSON.stringify({
            neighborSource: 'proc',
            resolveHostnames: true,
            hiddenInterfaces: ['docker0', 'virbr0'],
            interfaceKinds: { usb0: 'ethernet' },
        }));

        const config = await getConfig('/tmp/lan-glance.json');

        expect(config).toEqual({
            ...DEFAULT_CONFIG,
            neighborSource: 'proc',
            resolveHostnames: true,
            hiddenInterfaces: ['docker0', 'virbr0'],
            interfaceKinds: { usb0: 'ethernet' },
        });
    });

    it('reads YAML', async () => {
        vi.mocked(fs.readFile).mockResolvedValue([
            'logLevel: debug',
            'lookupTimeoutMs: 300',
            'hiddenInterfaces:',
            '  - docker0',
            '',
        ].join('\n'));

        const config = await getConfig('/tmp/lan-glance.yaml');

        expect(config.logLevel).toBe('debug');
        expect(config.lookupTimeoutMs).toBe(300);
        expect(config.hiddenInterfaces).toEqual(['docker0']);
        expect(logger.warn).not.toHaveBeenCalled();
    });

    it('treats an empty file as defaults', async () => {
        vi.mocked(fs.readFile).mockResolvedValue('');
        expect(await getConfig('/tmp/empty.yaml')).toEqual(DEFAULT_CONFIG);
        expect(logger.warn).not.toHaveBeenCalled();
    });

    it('warns and falls back to defaults on malformed content', async () => {
        vi.mocked(fs.readFile).mockResolvedValue('{ "logLevel": ');

        const config = await getConfig('/tmp/broken.json');

        expect(config).toEqual(DEFAULT_CONFIG);
        expect(logger.warn).toHaveBeenCalledTimes(1);
        expect(vi.mocked(logger.warn).mock.calls[0][1]).toMatch(/^Malformed config \/tmp\/broken\.json: /);
    });

    it('warns when the file exists but cannot be read', async () => {
        vi.mocked(fs.readFile).mockRejectedValue(Object.assign(new Error('EACCES: permission denied'), { code: 'EACCES' }));

        expect(await getConfig('/tmp/locked.json')).toEqual(DEFAULT_CONFIG);
        expect(logger.warn).toHaveBeenCalledWith('Config', 'Cannot read /tmp/locked.json: EACCES: permission denied');
    });
});

describe('normalizeConfig', () => {
    beforeEach(() => {
        vi.spyOn(logger, 'warn').mockImplementation(() => undefined);
    });

    it('keeps the default for every invalid value', () => {
        const config = normalizeConfig({
            logLevel: 'loud',
            commandTimeoutMs: -5,
            lookupTimeoutMs: 250,
            vendorLookup: 'yes',
            hiddenInterfaces: ['eth1', 7],
            interfaceKinds: { wwan0: 'cellular', br0: 'ethernet' },
        });

        expect(config.logLevel).toBe('warn');
        expect(config.commandTimeoutMs).toBe(2000);
        expect(config.lookupTimeoutMs).toBe(250);
        expect(config.vendorLookup).toBe(true);
        expect(config.hiddenInterfaces).toEqual([]);
        expect(config.interfaceKinds).toEqual({ br0: 'ethernet' });
        expect(logger.warn).toHaveBeenCalledWith('Config', 'Ignoring invalid value for "interfaceKinds.wwan0": "cellular"');
        expect(logger.warn).toHaveBeenCalledWith('Config', 'Ignoring invalid value for "commandTimeoutMs": -5');
    });

    it('does not share mutable defaults between calls', () => {
        const first = normalizeConfig({ interfaceKinds: { usb0: 'other' } });
        const second = normalizeConfig(undefined);
        expect(first.interfaceKinds).toEqual({ usb0: 'other' });
        expect(second.interfaceKinds).toEqual({});
        expect(DEFAULT_CONFIG.interfaceKinds).toEqual({});
    });

    it('rejects a file whose top level is not an object', () => {
        expect(normalizeConfig([1, 2])).toEqual(DEFAULT_CONFIG);
        expect(logger.warn).toHaveBeenCalledWith('Config', 'Ignoring invalid value for "<root>": [1,2]');
    });
});

describe('getConfigPath', () => {
    it('prefers LAN_GLANCE_CONFIG', () => {
        expect(getConfigPath({ LAN_GLANCE_CONFIG: '/etc/lan-glance.json', XDG_CONFIG_HOME: '/xdg' })).toBe('/etc/lan-glance.json');
    });

    it('lives under XDG_CONFIG_HOME otherwise', () => {
        expect(getConfigPath({ XDG_CONFIG_HOME: '/home/test/.cfg' })).toBe('/home/test/.cfg/lan-glance/config.yaml');
    });
});
