/**
 * @file Pathfinding.ts
 * @description Elevation-aware A* over a 1-unit navigation grid, plus a
 * breadth-first route over the map's area adjacency.
 *
 * Pathing is called by intent producers (agents) to pick movement targets.
 * The round engine itself never calls it.
 *
 * Grid model:
 *   - Cell (col, row) covers [col, col+1) x [row, row+1); its centre is the waypoint.
 *   - A cell is walkable when its centre is a valid standing position at the
 *     terrain elevation there.
 *   - Climbing to a neighbour is limited to MAX_CLIMB (STAIR_CLIMB when the
 *     current cell lies on a ramp or stairs). Dropping down is always allowed.
 */

import type { MapGeometry } from './MapGeometry.js';
import { DEFAULT_HEIGHT, DEFAULT_RADIUS } from './MapGeometry.js';
import { vec3, type Vec3 } from '../util/MathUtils.js';

// ============================================================================
// --- Constants ---
// ============================================================================

/** Cost of moving diagonally (sqrt(2) ~= 1.414) */
const DIAGONAL_COST = Math.SQRT2;

/** Cost of moving in a cardinal direction */
const CARDINAL_COST = 1.0;

/** Highest rise a player can take between two neighbouring cells on flat ground */
export const MAX_CLIMB = 1.5;

/** Highest rise between neighbouring cells while on a ramp or stairs */
export const STAIR_CLIMB = 3.0;

/** Upper bound on node expansions per search */
const MAX_EXPANSIONS = 5000;

/** Search radius (in cells) used to relax an unreachable goal */
const GOAL_RELAX_RADIUS = 2;

/**
 * 8-directional neighbour offsets: [deltaCol, deltaRow, movementCost].
 */
const NEIGHBORS: ReadonlyArray<readonly [number, number, number]> = [
  [-1, -1, DIAGONAL_COST],
  [ 0, -1, CARDINAL_COST],
  [ 1, -1, DIAGONAL_COST],
  [-1,  0, CARDINAL_COST],
  [ 1,  0, CARDINAL_COST],
  [-1,  1, DIAGONAL_COST],
  [ 0,  1, CARDINAL_COST],
  [ 1,  1, DIAGONAL_COST],
];

// ============================================================================
// --- Types ---
// ============================================================================

/** Grid cell index */
interface Cell {
  col: number;
  row: number;
}

/** Entry in the A* open list, kept sorted by f ascending */
interface OpenNode extends Cell {
  f: number;
}

/** Options for a single search */
export interface PathOptions {
  /** Body radius used for cell validity (default 0.5) */
  radius?: number;
  /** Body height used for cell validity (default 1.0) */
  height?: number;
}

// ============================================================================
// --- Pathfinder Class ---
// ============================================================================

/**
 * Pathfinder bound to one map.
 *
 * @example
 * ```ts
 * const pathfinder = new Pathfinder(map);
 * const route = pathfinder.findPath(vec3(2, 20, 0), vec3(45, 5, 0));
 * const areas = pathfinder.areaRoute('Attacker Spawn', 'A Site');
 * ```
 */
export class Pathfinder {
  private readonly cols: number;
  private readonly rows: number;

  /** Terrain elevation at each cell centre, indexed [row][col] */
  private readonly elevation: number[][];

  /** Whether each cell centre lies on a ramp or stairs */
  private readonly onSlope: boolean[][];

  constructor(private readonly map: MapGeometry) {
    this.cols = Math.floor(map.width);
    this.rows = Math.floor(map.height);
    this.elevation = [];
    this.onSlope = [];
    for (let row = 0; row < this.rows; row++) {
      this.elevation[row] = [];
      this.onSlope[row] = [];
      for (let col = 0; col < this.cols; col++) {
        const center = this.gridToWorld(col, row);
        this.elevation[row][col] = map.elevationAt(center.x, center.y);
        this.onSlope[row][col] = map.slopeAt(center.x, center.y) !== null;
      }
    }
  }

  // --------------------------------------------------------------------------
  // A* Search
  // --------------------------------------------------------------------------

  /**
   * Shortest climbable path between two world positions.
   *
   * The first waypoint is the exact start; the last is the goal cell centre at
   * its terrain elevation (the relaxed goal when the requested one is blocked).
   *
   * @returns Waypoints from start to goal, or [] when unreachable
   */
  findPath(start: Vec3, goal: Vec3, options: PathOptions = {}): Vec3[] {
    const radius = options.radius ?? DEFAULT_RADIUS;
    const height = options.height ?? DEFAULT_HEIGHT;
    const walkable = (col: number, row: number): boolean => this.isWalkable(col, row, radius, height);

    const startCell = this.worldToGrid(start);
    if (!this.inBounds(startCell) || !walkable(startCell.col, startCell.row)) {
      return [];
    }

    const goalCell = this.relaxGoal(this.worldToGrid(goal), walkable);
    if (goalCell === null) {
      return [];
    }

    const gScore: number[][] = [];
    const cameFrom: (Cell | null)[][] = [];
    const closed: boolean[][] = [];
    for (let r = 0; r < this.rows; r++) {
      gScore[r] = new Array<number>(this.cols).fill(Infinity);
      cameFrom[r] = new Array<Cell | null>(this.cols).fill(null);
      closed[r] = new Array<boolean>(this.cols).fill(false);
    }
    gScore[startCell.row][startCell.col] = 0;

    /* Octile distance: admissible for 8-way movement */
    const heuristic = (col: number, row: number): number => {
      const dc = Math.abs(col - goalCell.col);
      const dr = Math.abs(row - goalCell.row);
      return Math.max(dc, dr) + (DIAGONAL_COST - 1) * Math.min(dc, dr);
    };

    const open: OpenNode[] = [{ ...startCell, f: heuristic(startCell.col, startCell.row) }];
    let expansions = 0;

    while (open.length > 0 && expansions < MAX_EXPANSIONS) {
      const current = open.shift();
      if (current === undefined) break;
      if (closed[current.row][current.col]) continue;
      expansions++;

      if (current.col === goalCell.col && current.row === goalCell.row) {
        return this.reconstruct(cameFrom, goalCell, start);
      }
      closed[current.row][current.col] = true;

      const currentZ = this.elevation[current.row][current.col];
      const climbLimit = this.onSlope[current.row][current.col] ? STAIR_CLIMB : MAX_CLIMB;

      for (const [dc, dr, cost] of NEIGHBORS) {
        const nc = current.col + dc;
        const nr = current.row + dr;
        if (!this.inBounds({ col: nc, row: nr }) || closed[nr][nc] || !walkable(nc, nr)) {
          continue;
        }

        /* No diagonal corner cutting past blocked cells */
        if (dc !== 0 && dr !== 0 && (!walkable(current.col + dc, current.row) || !walkable(current.col, current.row + dr))) {
          continue;
        }

        const rise = this.elevation[nr][nc] - currentZ;
        if (rise > climbLimit) {
          continue;
        }

        const tentativeG = gScore[current.row][current.col] + Math.sqrt(cost * cost + rise * rise);
        if (tentativeG < gScore[nr][nc]) {
          gScore[nr][nc] = tentativeG;
          cameFrom[nr][nc] = { col: current.col, row: current.row };
          insertSorted(open, { col: nc, row: nr, f: tentativeG + heuristic(nc, nr) });
        }
      }
    }

    return [];
  }

  /**
   * Drop intermediate waypoints that the previous kept waypoint can see directly
   * and that sit at the same elevation (so slopes keep their stepping points).
   */
  smoothPath(path: readonly Vec3[]): Vec3[] {
    if (path.length <= 2) return [...path];

    const smoothed: Vec3[] = [path[0]];
    let current = 0;
    while (current < path.length - 1) {
      let next = current + 1;
      for (let check = path.length - 1; check > current + 1; check--) {
        if (this.canSkipTo(path, current, check)) {
          next = check;
          break;
        }
      }
      smoothed.push(path[next]);
      current = next;
    }
    return smoothed;
  }

  // --------------------------------------------------------------------------
  // Area Graph
  // --------------------------------------------------------------------------

  /**
   * Fewest-hop route between two named areas over the document's adjacency.
   *
   * @returns Area names from `from` to `to` inclusive, or [] when disconnected
   */
  areaRoute(from: string, to: string): string[] {
    if (from === to) return [from];

    const cameFrom = new Map<string, string | null>([[from, null]]);
    const queue: string[] = [from];
    while (queue.length > 0) {
      const area = queue.shift();
      if (area === undefined) break;
      for (const next of this.map.neighboursOf(area)) {
        if (cameFrom.has(next)) continue;
        cameFrom.set(next, area);
        if (next === to) {
          const route: string[] = [to];
          let step = cameFrom.get(to);
          while (step !== undefined && step !== null) {
            route.push(step);
            step = cameFrom.get(step);
          }
          return route.reverse();
        }
        queue.push(next);
      }
    }
    return [];
  }

  // --------------------------------------------------------------------------
  // Grid Helpers
  // --------------------------------------------------------------------------

  private isWalkable(col: number, row: number, radius: number, height: number): boolean {
    if (!this.inBounds({ col, row })) return false;
    const center = this.gridToWorld(col, row);
    return this.map.isValidPosition(center.x, center.y, this.elevation[row][col], radius, height);
  }

  /** The goal cell itself when walkable, else the nearest walkable cell within GOAL_RELAX_RADIUS. */
  private relaxGoal(goal: Cell, walkable: (col: number, row: number) => boolean): Cell | null {
    if (this.inBounds(goal) && walkable(goal.col, goal.row)) {
      return goal;
    }
    let best: Cell | null = null;
    let bestDist = Infinity;
    for (let dr = -GOAL_RELAX_RADIUS; dr <= GOAL_RELAX_RADIUS; dr++) {
      for (let dc = -GOAL_RELAX_RADIUS; dc <= GOAL_RELAX_RADIUS; dc++) {
        const cell = { col: goal.col + dc, row: goal.row + dr };
        const dist = dc * dc + dr * dr;
        if (dist < bestDist && walkable(cell.col, cell.row)) {
          best = cell;
          bestDist = dist;
        }
      }
    }
    return best;
  }

  private reconstruct(cameFrom: (Cell | null)[][], goal: Cell, start: Vec3): Vec3[] {
    const cells: Cell[] = [];
    let current: Cell | null = goal;
    while (current !== null) {
      cells.push(current);
      current = cameFrom[current.row][current.col];
    }
    cells.reverse();

    const path = cells.map((cell) => {
      const center = this.gridToWorld(cell.col, cell.row);
      return vec3(center.x, center.y, this.elevation[cell.row][cell.col]);
    });
    path[0] = start;
    return path;
  }

  private canSkipTo(path: readonly Vec3[], from: number, to: number): boolean {
    for (let i = from + 1; i <= to; i++) {
      if (Math.abs(path[i].z - path[from].z) > 1e-6) {
        return false;
      }
    }
    const eyeLift = 0.5;
    const a = vec3(path[from].x, path[from].y, path[from].z + eyeLift);
    const b = vec3(path[to].x, path[to].y, path[to].z + eyeLift);
    return this.map.lineOfSight(a, b) && this.map.canMove(path[from], path[to]);
  }

  private worldToGrid(pos: Vec3): Cell {
    return { col: Math.floor(pos.x), row: Math.floor(pos.y) };
  }

  private gridToWorld(col: number, row: number): { x: number; y: number } {
    return { x: col + 0.5, y: row + 0.5 };
  }

  private inBounds(cell: Cell): boolean {
    return cell.col >= 0 && cell.col < this.cols && cell.row >= 0 && cell.row < this.rows;
  }
}

/** Insert keeping the list sorted by f ascending (ties keep insertion order). */
function insertSorted(open: OpenNode[], node: OpenNode): void {
  for (let i = 0; i < open.length; i++) {
    if (node.f < open[i].f) {
      open.splice(i, 0, node);
      return;
    }
  }
  open.push(node);
}
