/**
 * Snapshot Collector
 *
 * Materializes everything one verification run needs before any check runs.
 * Remote calls are issued in parallel; a failed call is kept as a `Fetched`
 * error so the check that needed the value reports it as a FAIL.
 */

import type {
  Fetched,
  Inventory,
  MonitorSnapshot,
  StorageApplicationSnapshot,
  StorageSnapshot,
  UnitInfo,
} from '../types.js';
import { TopologyTree } from '../topology/tree.js';
import { findApplication, groupByApplication, inactiveUnitIds, monitorUnitFor } from '../inventory.js';
import { parseDiskUsageTree, parsePoolDetails } from './parsers.js';
import { errorMessage } from '../errors.js';
import { log } from '../logger.js';

/** Raw Ceph command output for a unit; the transport is up to the implementation */
export interface ClusterDataSource {
  health(unit: UnitInfo): Promise<string>;
  poolDetails(unit: UnitInfo): Promise<string>;
  diskUsageTree(unit: UnitInfo): Promise<string>;
  quorumStatus(unit: UnitInfo): Promise<string>;
}

export async function fetchValue<T>(label: string, fn: () => Promise<T>): Promise<Fetched<T>> {
  try {
    return { ok: true, value: await fn() };
  } catch (err) {
    const error = errorMessage(err);
    log(`[Collector] ${label} failed: ${error}`);
    return { ok: false, error };
  }
}

function attempt<T>(fn: () => T): Fetched<T> {
  try {
    return { ok: true, value: fn() };
  } catch (err) {
    return { ok: false, error: errorMessage(err) };
  }
}

function failed<T>(error: string): Fetched<T> {
  return { ok: false, error };
}

export async function collectStorageSnapshot(
  inventory: Inventory,
  targets: readonly UnitInfo[],
  source: ClusterDataSource,
): Promise<StorageSnapshot> {
  const groups = [...groupByApplication(targets).entries()];

  const monitors = groups.map(([application]) => ({
    application,
    monitor: attempt(() => monitorUnitFor(inventory, application)),
  }));

  const distinctMonitors = new Map<string, UnitInfo>();
  for (const { monitor } of monitors) {
    if (monitor.ok) distinctMonitors.set(monitor.value.id, monitor.value);
  }

  const [applications, health] = await Promise.all([
    Promise.all(groups.map(async ([application, units], i): Promise<StorageApplicationSnapshot> => {
      const { monitor } = monitors[i];
      const inactiveUnits = inactiveUnitIds(findApplication(inventory, application));

      if (!monitor.ok) {
        log(`[Collector] ${application}: ${monitor.error}`);
        return {
          application,
          targets: units,
          inactiveUnits,
          pools: failed(monitor.error),
          topology: failed(monitor.error),
        };
      }

      const monitorUnit = monitor.value;
      const [pools, topology] = await Promise.all([
        fetchValue(`pool details from ${monitorUnit.id}`,
          async () => parsePoolDetails(await source.poolDetails(monitorUnit))),
        fetchValue(`disk usage tree from ${monitorUnit.id}`,
          async () => new TopologyTree(parseDiskUsageTree(await source.diskUsageTree(monitorUnit)))),
      ]);

      return { application, targets: units, inactiveUnits, pools, topology };
    })),
    Promise.all([...distinctMonitors.values()].map(async unit => ({
      unit: unit.id,
      status: await fetchValue(`health from ${unit.id}`, () => source.health(unit)),
    }))),
  ]);

  return { health, applications };
}

export async function collectMonitorSnapshot(
  targets: readonly UnitInfo[],
  source: ClusterDataSource,
): Promise<MonitorSnapshot> {
  // one monitor per application is enough to read that cluster's health
  const healthUnits = [...groupByApplication(targets).values()].map(units => units[0]);

  const [quorum, health] = await Promise.all([
    Promise.all(targets.map(async unit => ({
      unit: unit.id,
      payload: await fetchValue(`quorum status from ${unit.id}`, () => source.quorumStatus(unit)),
    }))),
    Promise.all(healthUnits.map(async unit => ({
      unit: unit.id,
      status: await fetchValue(`health from ${unit.id}`, () => source.health(unit)),
    }))),
  ]);

  return { targets: [...targets], quorum, health };
}
