/**
 * Inventory Reader
 *
 * Reads the deployment inventory (applications, units, hosts) from Redis,
 * where the deployment controller publishes it, and falls back to the
 * inventory file when Redis is unavailable, empty or stale.
 */

import { readFile } from 'fs/promises';
import { Redis } from 'ioredis';
import type { Config } from '../config.js';
import type { Inventory } from '../types.js';
import { parseInventory } from './parsers.js';
import { errorMessage } from '../errors.js';
import { log } from '../logger.js';

/** Redis key where the deployment controller writes the latest inventory */
export const INVENTORY_KEY = 'verify:inventory:latest';

export type InventorySettings = Pick<Config, 'inventoryPath' | 'redisUrl' | 'inventoryStaleSeconds'>;

export class InventoryReader {
  private redis: Redis | null = null;
  private config: InventorySettings;
  private redisAvailable: boolean = true;

  constructor(config: InventorySettings) {
    this.config = config;
    this.initRedis();
  }

  private initRedis(): void {
    if (!this.config.redisUrl) {
      log('[Inventory] No Redis URL configured, reading inventory file');
      this.redisAvailable = false;
      return;
    }

    try {
      this.redis = new Redis(this.config.redisUrl, {
        maxRetriesPerRequest: 1,
        connectTimeout: 5000,
        commandTimeout: 3000,
        lazyConnect: true,
        retryStrategy: (times: number) => {
          if (times > 3) {
            log('[Inventory] Redis connection failed, falling back to inventory file');
            return null;
          }
          return Math.min(times * 200, 1000);
        },
      });

      this.redis.on('error', (err: Error) => {
        if (this.redisAvailable) {
          log(`[Inventory] Redis error: ${err.message}`);
          this.redisAvailable = false;
        }
      });
    } catch (err) {
      log(`[Inventory] Failed to initialize Redis: ${errorMessage(err)}`);
      this.redisAvailable = false;
    }
  }

  /**
   * Get the inventory.
   * Tries Redis first, falls back to the file if stale or unavailable.
   */
  async getInventory(): Promise<Inventory> {
    if (this.redis && this.redisAvailable) {
      try {
        const data = await this.redis.get(INVENTORY_KEY);
        if (data) {
          const inventory = parseInventory(data, 'redis');
          const ageSeconds = (Date.now() - inventory.timestamp.getTime()) / 1000;

          if (ageSeconds < this.config.inventoryStaleSeconds) {
            return inventory;
          }
          log(`[Inventory] Redis inventory stale (${ageSeconds.toFixed(0)}s old), falling back to file`);
        } else {
          log('[Inventory] No inventory in Redis, falling back to file');
        }
      } catch (err) {
        log(`[Inventory] Redis read failed: ${errorMessage(err)}, falling back to file`);
      }
    }

    return this.readFile();
  }

  private async readFile(): Promise<Inventory> {
    log(`[Inventory] Reading ${this.config.inventoryPath}`);
    const payload = await readFile(this.config.inventoryPath, 'utf8');
    return parseInventory(payload, 'file');
  }

  async close(): Promise<void> {
    if (this.redis) {
      this.redis.disconnect();
      this.redis = null;
    }
  }
}
