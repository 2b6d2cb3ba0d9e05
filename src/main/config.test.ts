import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { defaultConfig, loadConfig } from './config';

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'mount-config-'));
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('returns the defaults without overrides', () => {
    expect(loadConfig({})).toEqual(defaultConfig);
    expect(defaultConfig.catalogPath.endsWith(path.join('data', 'catalog.json'))).toBe(true);
  });

  it('reads MOUNT_* variables and ignores unparsable ones', () => {
    const config = loadConfig({
      MOUNT_ADDRESS: '10.0.0.5',
      PORT: '8080',
      MOUNT_AUTO_REVERSE: '0',
      MOUNT_AUTO_SCREEN: 'maybe',
      MOUNT_SPEED: 'fast',
      MOUNT_POLL_INTERVAL_MS: '2500'
    });

    expect(config.address).toBe('10.0.0.5');
    expect(config.port).toBe(8080);
    expect(config.autoReverse).toBe(false);
    expect(config.autoScreen).toBe(true);
    expect(config.speed).toBe(6);
    expect(config.pollIntervalMs).toBe(2500);
  });

  it('layers the environment over the config file', () => {
    const file = path.join(dir, 'mount.json');
    fs.writeFileSync(file, JSON.stringify({ address: 'simulate', autoScreen: false, historySize: 50, extra: 1 }));

    const config = loadConfig({ MOUNT_CONFIG: file, MOUNT_ADDRESS: '10.0.0.9' });

    expect(config.address).toBe('10.0.0.9');
    expect(config.autoScreen).toBe(false);
    expect(config.historySize).toBe(50);
    expect(config).not.toHaveProperty('extra');
  });

  it('falls back to the defaults when the file is unusable', () => {
    const file = path.join(dir, 'list.json');
    fs.writeFileSync(file, '[1, 2]');

    expect(loadConfig({ MOUNT_CONFIG: file })).toEqual(defaultConfig);
    expect(loadConfig({ MOUNT_CONFIG: path.join(dir, 'missing.json') })).toEqual(defaultConfig);

    const events = vi.mocked(console.warn).mock.calls.map(([line]) => JSON.parse(String(line)).event);
    expect(events).toEqual(['config_file_ignored', 'config_file_unreadable']);
  });
});
