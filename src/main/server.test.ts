import axios, { type AxiosInstance } from 'axios';
import { once } from 'events';
import type { Server } from 'http';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { StaticCatalog } from './catalog';
import { MountController } from './mountController';
import { createServer } from './server';
import { StatusHistory } from './statusHistory';

describe('control API', () => {
  let controller: MountController;
  let history: StatusHistory;
  let server: Server;
  let api: AxiosInstance;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);

    const catalog = new StaticCatalog([
      {
        name: 'deep-sky',
        objects: [{ names: 'M 51;Whirlpool Galaxy', ra: 202.5, dec: 47.2, magnitude: 8.4, type: 'galaxy', distance: 8580000 }]
      }
    ]);
    history = new StatusHistory();
    controller = new MountController({ resolver: catalog, pollIntervalMs: 3_600_000, waitIntervalMs: 0, now: () => 0 });
    controller.onMountEvent('updated', (snapshot) => history.addEntry(snapshot));
    await controller.connect('simulate');

    server = createServer({ controller, history, resolver: catalog }).listen(0, '127.0.0.1');
    await once(server, 'listening');
    const address = server.address();
    if (!address || typeof address === 'string') {
      throw new Error('server has no TCP address');
    }
    api = axios.create({ baseURL: `http://127.0.0.1:${address.port}/api/`, validateStatus: () => true });
  });

  afterEach(async () => {
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
    await controller.close();
    vi.restoreAllMocks();
  });

  it('serves the mount snapshot', async () => {
    const res = await api.get('mount/status');

    expect(res.status).toBe(200);
    expect(res.data).toMatchObject({ address: 'simulate', mode: 'simulate', status: 'SCOPE', speed: 6 });
  });

  it('refreshes the status on demand', async () => {
    const res = await api.post('mount/refresh');

    expect(res.data.text).toBe('RA=0+0.000000 DEC=0+0.000000 [SCOPE] X=0 Y=0');
    expect(res.data.snapshot.status).toBe('SCOPE');
  });

  it('starts a goto from coordinates', async () => {
    const res = await api.post('mount/goto', { ra: '1h30m', dec: 6 });

    expect(res.status).toBe(200);
    expect(res.data).toEqual({
      status: 'sent',
      reply: 'OK',
      target: { ra: { hours: 1, minutes: 30 }, dec: { degrees: 6, minutes: 0, negative: false } }
    });
  });

  it('maps rejected gotos and malformed bodies to client errors', async () => {
    const missing = await api.post('mount/goto', { name: 'Nowhere' });
    expect(missing.status).toBe(404);
    expect(missing.data).toMatchObject({ status: 'rejected', code: 'OBJECT_NOT_FOUND' });

    const invalid = await api.post('mount/goto', { ra: 'abc', dec: 0 });
    expect(invalid.status).toBe(400);
    expect(invalid.data.code).toBe('INVALID_COORDINATE');

    const empty = await api.post('mount/goto', {});
    expect(empty.status).toBe(400);
    expect(empty.data.code).toBe('BAD_REQUEST');
  });

  it('changes the speed by level or zoom step', async () => {
    expect((await api.post('mount/speed', { zoom: 'out' })).data).toEqual({ speed: 7 });
    expect((await api.post('mount/speed', { level: 2 })).data).toEqual({ reply: 'OK', speed: 2 });
    expect((await api.post('mount/speed', { level: 'fast' })).status).toBe(400);
  });

  it('updates options', async () => {
    const res = await api.put('mount/options', { autoScreen: false });
    expect(res.data).toEqual({ autoReverse: true, autoScreen: false });
    expect(controller.getSnapshot().autoScreen).toBe(false);

    expect((await api.put('mount/options', { autoReverse: 'yes' })).status).toBe(400);
  });

  it('answers 204 when there is no screen', async () => {
    expect((await api.get('mount/screen')).status).toBe(204);
  });

  it('builds grids around coordinates or a named object', async () => {
    const around = await api.get('mount/grid', { params: { ra: '10', dec: '20', n: 1 } });
    expect(around.data).toEqual([
      { catalog: 'grid', name: 'RA=10.00 DEC=20.00', ra: 150, dec: 20, magnitude: 0, type: 'grid', distance: 0 }
    ]);

    const named = await api.get('mount/grid', { params: { name: 'M 51', n: 1 } });
    expect(named.data[0].name).toBe('RA=13.50 DEC=47.20');

    expect((await api.get('mount/grid')).status).toBe(400);
    expect((await api.get('mount/grid', { params: { name: 'Nowhere' } })).status).toBe(404);
  });

  it('lists sky map and site links', async () => {
    const res = await api.get('mount/links');

    expect(res.data.skyMap.startsWith('http://www.sky-map.org/?ra=0.000000&de=0.000000&zoom=3&')).toBe(true);
    expect(res.data.location).toBe('https://maps.google.fr/?q=45.033333,5.033333');
  });

  it('exports the status history as CSV', async () => {
    const res = await api.get('mount/history.csv', { responseType: 'text' });

    expect(res.headers['content-type']).toBe('text/csv; charset=utf-8');
    expect(res.data).toBe('timestamp_iso;status;ra;dec;x;y;target\n1970-01-01T00:00:00.000Z;SCOPE;0+0.000000;0+0.000000;0;0;');
  });

  it('looks up catalog objects', async () => {
    const found = await api.get('catalog/M51');
    expect(found.data).toMatchObject({ name: 'M 51;Whirlpool Galaxy', raText: '13+30.00', decText: '47+12.00' });

    const missing = await api.get('catalog/Nowhere');
    expect(missing.status).toBe(404);
    expect(missing.data.code).toBe('OBJECT_NOT_FOUND');
  });
});
