#!/usr/bin/env node
/**
 * Ceph Removal Guard
 *
 * Pre-flight check run before rebooting or shutting down Ceph units. Exits
 * with 0 only when every check passed.
 *
 * Usage:
 *   npx tsx src/index.ts reboot ceph-osd/0 ceph-osd/1
 *   npx tsx src/index.ts shutdown ceph-mon/2
 *
 * Data Flow:
 *   Inventory (Redis → file) → target units → monitor hosts (SSH, ceph CLI)
 *     → snapshot → checks → verdict → stdout + Postgres audit row
 */

import { loadConfig, type Config } from './config.js';
import { InventoryReader } from './services/inventory-reader.js';
import { SshCephDataSource } from './services/ceph-cli.js';
import { EventPublisher } from './services/events.js';
import { verifyUnits } from './verifiers/dispatch.js';
import { Result } from './verification/result.js';
import { errorMessage } from './errors.js';
import { log } from './logger.js';

async function runVerification(config: Config, inventoryReader: InventoryReader): Promise<Result> {
  try {
    const inventory = await inventoryReader.getInventory();
    log(`[Guard] Inventory from ${inventory.source} (${inventory.timestamp.toISOString()})`);
    return await verifyUnits(config, inventory, config.targets, new SshCephDataSource(config));
  } catch (err) {
    log(`[Guard] Verification aborted: ${errorMessage(err)}`);
    return new Result('FAIL', `Verification could not be performed: ${errorMessage(err)}`);
  }
}

async function main(): Promise<void> {
  const config = loadConfig();
  const inventoryReader = new InventoryReader(config);
  const eventPublisher = new EventPublisher(config);

  log(`[Guard] Verifying ${config.operation} of ${config.targets.join(', ')}`);
  log(`[Guard] Failure domain: ${config.failureDomain}, minimum agent version: ${config.minimumAgentVersion}`);

  try {
    const result = await runVerification(config, inventoryReader);
    console.log(result.format());
    await eventPublisher.publishVerdict(config.operation, config.targets, result);
    process.exitCode = result.success ? 0 : 1;
  } finally {
    await inventoryReader.close();
    await eventPublisher.close();
  }
}

main().catch(err => {
  console.error('Fatal error:', errorMessage(err));
  process.exit(2);
});
