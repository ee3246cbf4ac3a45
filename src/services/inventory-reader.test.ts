/**
 * Inventory Reader Tests
 *
 * Redis is replaced by an in-process stub; the file fallback uses a temp dir.
 */

import { describe, it, expect, vi, beforeAll, beforeEach, afterAll } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { InventoryReader } from './inventory-reader.js';
import { MalformedDataError } from '../errors.js';

const { get, disconnect } = vi.hoisted(() => ({ get: vi.fn(), disconnect: vi.fn() }));

vi.mock('ioredis', () => {
  class Redis {
    get = get;
    disconnect = disconnect;
    on = vi.fn();
  }
  return { Redis };
});

const DOCUMENT = {
  timestamp: '2026-10-01T12:00:00Z',
  applications: [
    {
      name: 'ceph-osd',
      role: 'storage',
      monitorApplication: 'ceph-mon',
      units: [{ id: 'ceph-osd/0', hostname: 'host-0', address: '10.0.1.10', workloadStatus: 'active' }],
    },
  ],
};

describe('InventoryReader', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'inventory-'));
    await writeFile(join(dir, 'inventory.json'), JSON.stringify(DOCUMENT));
    await writeFile(join(dir, 'broken.json'), '{"applications": []}');
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads the inventory file', async () => {
    const reader = new InventoryReader({ inventoryPath: join(dir, 'inventory.json'), inventoryStaleSeconds: 300 });

    const inventory = await reader.getInventory();
    await reader.close();

    expect(inventory.source).toBe('file');
    expect(inventory.timestamp.toISOString()).toBe('2026-10-01T12:00:00.000Z');
    expect(inventory.applications[0].units[0]).toEqual({
      id: 'ceph-osd/0',
      application: 'ceph-osd',
      hostname: 'host-0',
      address: '10.0.1.10',
      workloadStatus: 'active',
    });
  });

  it('rejects a malformed inventory file', async () => {
    const reader = new InventoryReader({ inventoryPath: join(dir, 'broken.json'), inventoryStaleSeconds: 300 });

    await expect(reader.getInventory()).rejects.toThrow(MalformedDataError);
    await expect(reader.getInventory()).rejects.toThrow('Malformed inventory: timestamp: Required');
  });

  it('reports a missing inventory file', async () => {
    const reader = new InventoryReader({ inventoryPath: join(dir, 'missing.json'), inventoryStaleSeconds: 300 });

    await expect(reader.getInventory()).rejects.toThrow(/ENOENT/);
  });

  describe('with Redis', () => {
    const settings = () => ({
      redisUrl: 'redis://localhost:6379',
      inventoryPath: join(dir, 'inventory.json'),
      inventoryStaleSeconds: 300,
    });

    beforeEach(() => {
      get.mockReset();
      disconnect.mockReset();
    });

    it('uses a fresh Redis inventory', async () => {
      get.mockResolvedValue(JSON.stringify({ ...DOCUMENT, timestamp: new Date().toISOString() }));
      const reader = new InventoryReader(settings());

      const inventory = await reader.getInventory();
      await reader.close();

      expect(get).toHaveBeenCalledWith('verify:inventory:latest');
      expect(inventory.source).toBe('redis');
      expect(inventory.applications[0].units[0].id).toBe('ceph-osd/0');
      expect(disconnect).toHaveBeenCalledOnce();
    });

    it('falls back to the file when the Redis inventory is stale', async () => {
      get.mockResolvedValue(JSON.stringify({ ...DOCUMENT, timestamp: '2000-01-01T00:00:00Z' }));

      const inventory = await new InventoryReader(settings()).getInventory();

      expect(inventory.source).toBe('file');
      expect(inventory.timestamp.toISOString()).toBe('2026-10-01T12:00:00.000Z');
    });

    it('falls back to the file when the key is empty', async () => {
      get.mockResolvedValue(null);

      expect((await new InventoryReader(settings()).getInventory()).source).toBe('file');
    });

    it('falls back to the file when the Redis payload is malformed', async () => {
      get.mockResolvedValue('{"timestamp":');

      expect((await new InventoryReader(settings()).getInventory()).source).toBe('file');
    });

    it('falls back to the file when the Redis read fails', async () => {
      get.mockRejectedValue(new Error('Command timed out'));

      expect((await new InventoryReader(settings()).getInventory()).source).toBe('file');
    });
  });
});
