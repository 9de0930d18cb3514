/**
 * @file MapLoader.ts
 * @description Reads a map document from disk and builds its MapGeometry.
 *
 * Every failure (missing file, bad JSON, schema or semantic problems) is raised
 * here as a SimulationError, before any Round can be constructed against the map.
 */

import { readFileSync } from 'fs';
import { MapGeometry } from './MapGeometry.js';
import { SimulationError } from '../util/SimulationError.js';
import { createLogger } from '../util/Logger.js';

const log = createLogger('map-loader');

/**
 * Load and validate a map document.
 *
 * @param filePath - Path to the JSON document
 * @throws SimulationError (MAP_NOT_FOUND | MAP_INVALID)
 *
 * @example
 * const map = loadMapFile('data/maps/foundry.json');
 */
export function loadMapFile(filePath: string): MapGeometry {
  let raw: string;
  try {
    raw = readFileSync(filePath, 'utf8');
  } catch (error) {
    throw new SimulationError('MAP_NOT_FOUND', `Cannot read map file ${filePath}`, {
      path: filePath,
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  let document: unknown;
  try {
    document = JSON.parse(raw);
  } catch (error) {
    throw SimulationError.mapInvalid(`Map file ${filePath} is not valid JSON`, {
      path: filePath,
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  const map = MapGeometry.fromDocument(document);
  log.info(
    { map: map.name, areas: map.areas.length, walls: map.walls.length, objects: map.objects.length },
    'Map loaded',
  );
  return map;
}
