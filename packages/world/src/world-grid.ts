import type {
  Address,
  AddressLevel,
  BlockLayerName,
  GridEvent,
  LayerName,
  Logger,
  PixelCoord,
  TileCoord,
  WorldConfig,
} from "@townsim/schemas";
import { ConfigError, OutOfBoundsError } from "@townsim/schemas";
import { EventSet, makeIdleEvent, type ReadonlyEventSet } from "./grid-event.js";
import { joinAddress, spawnAddress } from "./address.js";

export interface Tile {
  readonly world: string;
  readonly sector: string;
  readonly arena: string;
  readonly game_object: string;
  readonly spawning_location: string;
  readonly collision: boolean;
  /** Mutated only through WorldGrid's event operations. */
  readonly events: ReadonlyEventSet;
}

interface GridTile extends Tile {
  readonly events: EventSet;
}

export interface WorldGridOptions {
  logger?: Logger;
}

const LAYERS: readonly LayerName[] = ["collision", "sector", "arena", "game_object", "spawning_location"];
const PASSABLE_CODE = "0";

/**
 * The static world: a `width x height` grid of tiles with semantic address
 * layers, collision flags and a per-tile event ledger. Everything but the
 * event sets is fixed at load.
 *
 * Event mutation is not synchronized. Callers must keep at most one writer
 * per tile at a time.
 */
export class WorldGrid {
  readonly width: number;
  readonly height: number;
  readonly tileSize: number;
  readonly worldName: string;
  readonly specialConstraint: unknown;

  private tiles: GridTile[][];
  private addressIndex: ReadonlyMap<string, readonly TileCoord[]>;

  private constructor(config: WorldConfig, tiles: GridTile[][], addressIndex: Map<string, TileCoord[]>) {
    this.width = config.meta.width;
    this.height = config.meta.height;
    this.tileSize = config.meta.tile_size;
    this.worldName = config.world_name;
    this.specialConstraint = config.meta.special_constraint;
    this.tiles = tiles;
    this.addressIndex = addressIndex;
  }

  static load(config: WorldConfig, options?: WorldGridOptions): WorldGrid {
    const { width, height, tile_size } = config.meta;
    for (const [field, value] of [["width", width], ["height", height], ["tile_size", tile_size]] as const) {
      if (!Number.isInteger(value) || value < 1) {
        throw new ConfigError(`meta.${field} must be a positive integer, got ${value}`, { field: `meta.${field}` });
      }
    }
    if (config.world_name.length === 0) {
      throw new ConfigError("world_name must not be empty", { field: "world_name" });
    }
    const cells = width * height;
    for (const layer of LAYERS) {
      const codes = config.layers[layer];
      if (codes.length !== cells) {
        throw new ConfigError(
          `Layer "${layer}" has ${codes.length} cells, expected ${cells} (${width}x${height})`,
          { layer, expected: cells, actual: codes.length }
        );
      }
    }

    const resolve = (layer: BlockLayerName, idx: number): string => {
      const code = config.layers[layer][idx] ?? "";
      return Object.hasOwn(config.blocks[layer], code) ? config.blocks[layer][code] ?? "" : "";
    };

    const tiles: GridTile[][] = [];
    const addressIndex = new Map<string, TileCoord[]>();
    const index = (key: string, coord: TileCoord) => {
      const bucket = addressIndex.get(key);
      if (bucket) bucket.push(coord);
      else addressIndex.set(key, [coord]);
    };

    for (let y = 0; y < height; y++) {
      const row: GridTile[] = [];
      for (let x = 0; x < width; x++) {
        const idx = y * width + x;
        const world = config.world_name;
        const sector = resolve("sector", idx);
        const arena = resolve("arena", idx);
        const gameObject = resolve("game_object", idx);
        const spawn = resolve("spawning_location", idx);

        const events = new EventSet();
        if (gameObject) {
          events.add(makeIdleEvent(joinAddress(world, sector, arena, gameObject)));
        }

        const coord: TileCoord = [x, y];
        if (sector) index(joinAddress(world, sector), coord);
        if (arena) index(joinAddress(world, sector, arena), coord);
        if (gameObject) index(joinAddress(world, sector, arena, gameObject), coord);
        if (spawn) index(spawnAddress(spawn), coord);

        row.push({
          world,
          sector,
          arena,
          game_object: gameObject,
          spawning_location: spawn,
          collision: (config.layers.collision[idx] ?? PASSABLE_CODE) !== PASSABLE_CODE,
          events,
        });
      }
      tiles.push(row);
    }

    options?.logger?.info(`Loaded world "${config.world_name}"`, {
      width,
      height,
      tile_size,
      addresses: addressIndex.size,
    });
    return new WorldGrid(config, tiles, addressIndex);
  }

  /**
   * Pixel to tile by ceiling division per axis: a pixel exactly on a tile
   * boundary maps to the following tile.
   */
  coordinateToTile(pixel: PixelCoord): TileCoord {
    return [Math.ceil(pixel[0] / this.tileSize), Math.ceil(pixel[1] / this.tileSize)];
  }

  inBounds(coord: TileCoord): boolean {
    const [x, y] = coord;
    return Number.isInteger(x) && Number.isInteger(y) && x >= 0 && y >= 0 && x < this.width && y < this.height;
  }

  accessTile(coord: TileCoord): Tile {
    return this.gridTile(coord);
  }

  addressOf(coord: TileCoord, level: AddressLevel): Address {
    const tile = this.gridTile(coord);
    switch (level) {
      case "world":
        return tile.world;
      case "sector":
        return joinAddress(tile.world, tile.sector);
      case "arena":
        return joinAddress(tile.world, tile.sector, tile.arena);
      case "object":
        return joinAddress(tile.world, tile.sector, tile.arena, tile.game_object);
    }
  }

  /** All coordinates in the square of the given radius around `center`, clipped to the grid. */
  tilesNear(center: TileCoord, radius: number): TileCoord[] {
    const [x, y] = center;
    const xMin = Math.max(0, x - radius);
    const xMax = Math.min(this.width, x + radius + 1);
    const yMin = Math.max(0, y - radius);
    const yMax = Math.min(this.height, y + radius + 1);

    const result: TileCoord[] = [];
    for (let i = xMin; i < xMax; i++) {
      for (let j = yMin; j < yMax; j++) {
        result.push([i, j]);
      }
    }
    return result;
  }

  /** Coordinates indexed under an address or spawn key; empty if never indexed. */
  tilesForAddress(address: Address): TileCoord[] {
    return [...(this.addressIndex.get(address) ?? [])];
  }

  addEvent(event: GridEvent, coord: TileCoord): void {
    this.gridTile(coord).events.add(event);
  }

  removeEvent(event: GridEvent, coord: TileCoord): void {
    this.gridTile(coord).events.delete(event);
  }

  /** Replaces a matching event with its idle variant; no-op when absent. */
  idleEvent(event: GridEvent, coord: TileCoord): void {
    const events = this.gridTile(coord).events;
    if (events.delete(event)) {
      events.add(makeIdleEvent(event.subject));
    }
  }

  removeSubjectEvents(subject: Address, coord: TileCoord): void {
    this.gridTile(coord).events.deleteWhere((event) => event.subject === subject);
  }

  private gridTile(coord: TileCoord): GridTile {
    const [x, y] = coord;
    const tile = this.inBounds(coord) ? this.tiles[y]?.[x] : undefined;
    if (!tile) throw new OutOfBoundsError(x, y, this.width, this.height);
    return tile;
  }
}
