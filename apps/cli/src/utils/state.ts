import { existsSync, readFileSync, writeFileSync } from 'node:fs';
import type { Address, RouteSelector } from '@sluice/types';

/** Contents of the persisted state file */
export interface PersistedState {
  routeSelector: RouteSelector;
  updatedAt: string;
  updatedBy: Address | null;
}

/**
 * Read the persisted route selector. A missing file means the engine default.
 */
export function readState(path: string): PersistedState | null {
  if (!existsSync(path)) return null;

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    throw new Error(`Failed to read state file ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }

  if (!isPersistedState(parsed)) {
    throw new Error(`State file ${path} is malformed`);
  }
  return parsed;
}

export function writeState(path: string, routeSelector: RouteSelector, updatedBy: Address | null, now = new Date()): void {
  const state: PersistedState = { routeSelector, updatedAt: now.toISOString(), updatedBy };
  writeFileSync(path, JSON.stringify(state, null, 2) + '\n');
}

function isPersistedState(value: unknown): value is PersistedState {
  if (typeof value !== 'object' || value === null) return false;
  const record: Record<string, unknown> = { ...value };
  return (
    (record.routeSelector === 'pool' || record.routeSelector === 'router') &&
    typeof record.updatedAt === 'string' &&
    (record.updatedBy === null || typeof record.updatedBy === 'string')
  );
}
