import { describe, it, expect, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { fileURLToPath } from 'url';
import { loadMapFile } from '../../shared/map/MapLoader.js';
import { SimulationError } from '../../shared/util/SimulationError.js';

const FOUNDRY = fileURLToPath(new URL('../../data/maps/foundry.json', import.meta.url));
const ARENA = fileURLToPath(new URL('../fixtures/arena.json', import.meta.url));

function loadError(path: string): SimulationError | null {
  try {
    loadMapFile(path);
  } catch (error) {
    return SimulationError.isSimulationError(error) ? error : null;
  }
  return null;
}

describe('loadMapFile', () => {
  let tmp: string | null = null;

  afterEach(() => {
    if (tmp !== null) {
      rmSync(tmp, { recursive: true, force: true });
      tmp = null;
    }
  });

  it('loads the bundled map', () => {
    const map = loadMapFile(FOUNDRY);
    expect(map.name).toBe('Foundry');
    expect(map.width).toBe(60);
    expect(map.height).toBe(40);
    expect(map.bombSites.length).toBeGreaterThan(0);
  });

  it('loads the test arena', () => {
    expect(loadMapFile(ARENA).name).toBe('Arena');
  });

  it('reports a missing file as MAP_NOT_FOUND', () => {
    expect(loadError('/nonexistent/maps/missing.json')?.code).toBe('MAP_NOT_FOUND');
  });

  it('reports malformed JSON as MAP_INVALID', () => {
    tmp = mkdtempSync(join(tmpdir(), 'round-sim-'));
    const path = join(tmp, 'broken.json');
    writeFileSync(path, '{ "metadata": ');
    expect(loadError(path)?.code).toBe('MAP_INVALID');
  });

  it('reports a schema failure as MAP_INVALID', () => {
    tmp = mkdtempSync(join(tmpdir(), 'round-sim-'));
    const path = join(tmp, 'empty.json');
    writeFileSync(path, JSON.stringify({ metadata: { name: 'Empty', 'map-size': [10, 10] } }));
    expect(loadError(path)?.code).toBe('MAP_INVALID');
  });
});
