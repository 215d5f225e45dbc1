// engine/registry.ts
import type { PhaseDriver, PhaseName } from "@/types/experiment";

type Id = string;

const _drivers = new Map<Id, PhaseDriver>();
const _defaultsByPhase = new Map<PhaseName, Id>();

export function registerDriver(driver: PhaseDriver) {
  if (!driver?.id) throw new Error("registerDriver: driver.id is required");
  if (_drivers.has(driver.id)) throw new Error(`registerDriver: duplicate driver id '${driver.id}'`);
  _drivers.set(driver.id, driver);
}

export function setDefaultDriverForPhase(phase: PhaseName, driverId: Id) {
  const d = _drivers.get(driverId);
  if (!d) throw new Error(`setDefaultDriverForPhase: no such driver '${driverId}'`);
  if (d.phase !== phase) throw new Error(`setDefaultDriverForPhase: driver '${driverId}' runs '${d.phase}', not '${phase}'`);
  _defaultsByPhase.set(phase, driverId);
}

/** Resolve by phase→default. */
export function resolveDriver(ref: { phase: PhaseName }): PhaseDriver {
  const id = _defaultsByPhase.get(ref.phase);
  if (!id) throw new Error(`resolveDriver: no default driver for phase '${ref.phase}'`);
  const d = _drivers.get(id);
  if (!d) throw new Error(`resolveDriver: default id '${id}' for phase '${ref.phase}' not registered`);
  return d;
}

/** For observability / `show` */
export function registryHealth() {
  return {
    count: _drivers.size,
    drivers: Array.from(_drivers.values()).map(d => ({ id: d.id, phase: d.phase, version: d.version, capabilities: d.capabilities ?? {} })),
    defaults: Object.fromEntries(_defaultsByPhase.entries()),
  };
}

/** Test-only reset */
export function __resetRegistryForTests__() {
  _drivers.clear();
  _defaultsByPhase.clear();
}
