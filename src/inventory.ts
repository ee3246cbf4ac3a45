/**
 * Inventory lookups shared by the collector and the dispatcher.
 */

import type { ApplicationInfo, Inventory, UnitInfo, UnitRole } from './types.js';
import { InvalidArgumentError, NotFoundError } from './errors.js';

export function findApplication(inventory: Inventory, name: string): ApplicationInfo {
  const app = inventory.applications.find(a => a.name === name);
  if (!app) throw new NotFoundError(`Application ${name} was not found in the inventory.`);
  return app;
}

export interface ResolvedTargets {
  role: UnitRole;
  units: UnitInfo[];
}

/** Resolve unit ids to units; all targets must share one role. */
export function resolveTargets(inventory: Inventory, unitIds: readonly string[]): ResolvedTargets {
  if (unitIds.length === 0) {
    throw new InvalidArgumentError('No units were selected for verification.');
  }

  const byId = new Map<string, { unit: UnitInfo; role: UnitRole }>();
  for (const app of inventory.applications) {
    for (const unit of app.units) byId.set(unit.id, { unit, role: app.role });
  }

  const resolved = [...new Set(unitIds)].map(id => {
    const entry = byId.get(id);
    if (!entry) throw new NotFoundError(`Unit ${id} was not found in the inventory.`);
    return entry;
  });

  const roles = new Set(resolved.map(r => r.role));
  if (roles.size > 1) {
    throw new InvalidArgumentError(
      `Selected units mix storage and monitor roles: ${resolved.map(r => `${r.unit.id}(${r.role})`).join(', ')}`,
    );
  }

  return { role: resolved[0].role, units: resolved.map(r => r.unit) };
}

export function inactiveUnitIds(app: ApplicationInfo): string[] {
  return app.units.filter(u => u.workloadStatus !== 'active').map(u => u.id);
}

export function firstActiveUnit(app: ApplicationInfo): UnitInfo | undefined {
  return app.units.find(u => u.workloadStatus === 'active');
}

/** First active unit of the monitor application serving a storage application */
export function monitorUnitFor(inventory: Inventory, storageApplication: string): UnitInfo {
  const app = findApplication(inventory, storageApplication);
  if (!app.monitorApplication) {
    throw new NotFoundError(`Application ${storageApplication} has no related monitor application.`);
  }

  const monitorApp = findApplication(inventory, app.monitorApplication);
  const unit = firstActiveUnit(monitorApp);
  if (!unit) {
    throw new NotFoundError(
      `No active unit of ${monitorApp.name} related to ${storageApplication} was found.`,
    );
  }
  return unit;
}

/** Group units by application, in order of first appearance */
export function groupByApplication(units: readonly UnitInfo[]): Map<string, UnitInfo[]> {
  const groups = new Map<string, UnitInfo[]>();
  for (const unit of units) {
    groups.set(unit.application, [...(groups.get(unit.application) ?? []), unit]);
  }
  return groups;
}
