import { mkdtempSync, readdirSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join, relative } from 'path';
import { vi } from 'vitest';

import { resolveRootPaths } from '../src/lib/helper/config.js';
import type { RootPaths } from '../src/lib/helper/types.js';

export interface Sandbox {
  roots: RootPaths;
  cleanup: () => void;
}

export function createSandbox(): Sandbox {
  const dir = mkdtempSync(join(tmpdir(), 'automation-helper-'));
  return {
    roots: resolveRootPaths(dir),
    cleanup: () => rmSync(dir, { recursive: true, force: true }),
  };
}

export function silenceConsole() {
  return {
    log: vi.spyOn(console, 'log').mockImplementation(() => {}),
    warn: vi.spyOn(console, 'warn').mockImplementation(() => {}),
  };
}

/** Every file below `dir`, relative to it, sorted. */
export function listFiles(dir: string, base = dir): string[] {
  return readdirSync(dir, { withFileTypes: true })
    .flatMap((entry) => {
      const fullPath = join(dir, entry.name);
      return entry.isDirectory() ? listFiles(fullPath, base) : [relative(base, fullPath)];
    })
    .sort();
}

export const hallwayTrigger = [
  {
    platform: 'state',
    entity_id: 'binary_sensor.hallway_motion',
    to: 'on',
  },
];

export const hallwayAction = [
  {
    service: 'light.turn_on',
    target: {
      entity_id: 'light.hallway',
    },
  },
];
