/**
 * Zod schema for the declarative map document.
 *
 * Keys follow the document format the map tooling writes (kebab-case section
 * names, `w`/`h` extents, `height_z` vertical extents). Walls default to a
 * height of 10 and objects to 2 when `height_z` is omitted.
 */

import { z } from 'zod';

const extent = z.number().finite();
const size = z.number().finite().positive();

const boxSchema = z.object({
  x: extent,
  y: extent,
  w: size,
  h: size,
});

const slopeDirection = z.enum(['north', 'south', 'east', 'west']);

const point = z.tuple([extent, extent, extent]);

export const areaSchema = boxSchema.extend({
  elevation: z.number().finite().min(0).default(0),
});

export const wallSchema = boxSchema.extend({
  z: extent.default(0),
  height_z: z.number().finite().nonnegative().default(10),
});

export const objectSchema = boxSchema.extend({
  z: extent.default(0),
  height_z: z.number().finite().nonnegative().default(2),
});

export const stairsSchema = boxSchema.extend({
  z: z.number().finite().min(0).default(0),
  height_z: size,
  direction: slopeDirection,
  steps: z.number().int().positive().default(5),
});

export const rampSchema = boxSchema.extend({
  z_start: z.number().finite().min(0),
  z_end: z.number().finite().min(0),
  direction: slopeDirection,
});

export const mapDocumentSchema = z.object({
  metadata: z.object({
    name: z.string().min(1),
    'map-size': z.tuple([size, size]),
  }),
  'map-areas': z.record(areaSchema).refine((areas) => Object.keys(areas).length > 0, {
    message: 'At least one walkable area is required',
  }),
  walls: z.record(wallSchema).default({}),
  objects: z.record(objectSchema).default({}),
  stairs: z.record(stairsSchema).default({}),
  ramps: z.record(rampSchema).default({}),
  'bomb-sites': z.record(boxSchema).refine((sites) => Object.keys(sites).length > 0, {
    message: 'At least one bomb site is required',
  }),
  spawns: z.object({
    attackers: z.array(point).min(1),
    defenders: z.array(point).min(1),
  }),
  adjacency: z.record(z.array(z.string())).default({}),
});

/** Raw document as written on disk, before defaults. */
export type MapDocumentInput = z.input<typeof mapDocumentSchema>;

/** Parsed document with defaults applied. */
export type MapDocument = z.infer<typeof mapDocumentSchema>;
