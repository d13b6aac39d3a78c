import { readFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import { join } from "node:path";
import yaml from "js-yaml";
import type { BlockLayerName, LayerName, WorldConfig, WorldMeta } from "@townsim/schemas";
import { ConfigError, validateWorldConfigData } from "@townsim/schemas";

const LAYER_FILES: Record<LayerName, string> = {
  collision: "collision_maze.csv",
  sector: "sector_maze.csv",
  arena: "arena_maze.csv",
  game_object: "game_object_maze.csv",
  spawning_location: "spawning_location_maze.csv",
};

const BLOCK_FILES: Record<BlockLayerName, string> = {
  sector: "sector_blocks.csv",
  arena: "arena_blocks.csv",
  game_object: "game_object_blocks.csv",
  spawning_location: "spawning_location_blocks.csv",
};

async function readText(path: string, data: { layer?: string; file: string }): Promise<string> {
  if (!existsSync(path)) throw new ConfigError(`World config file not found: ${path}`, data);
  return readFile(path, "utf-8");
}

/**
 * Reads a world config bundle from a single YAML or JSON document. Layer
 * codes may be written as numbers; they are normalized to strings.
 */
export async function loadWorldConfigFile(filePath: string): Promise<WorldConfig> {
  const content = await readText(filePath, { file: filePath });
  let data: unknown;
  try {
    data = yaml.load(content);
  } catch (err) {
    throw new ConfigError(
      `Invalid world config at "${filePath}": ${err instanceof Error ? err.message : String(err)}`,
      { file: filePath }
    );
  }
  const validation = validateWorldConfigData(data);
  if (!validation.valid) {
    throw new ConfigError(`Invalid world config at "${filePath}": ${validation.errors.join(", ")}`, {
      file: filePath,
      errors: validation.errors,
    });
  }
  const doc = validation.value;
  const layers = {
    collision: doc.layers.collision.map(String),
    sector: normalizeCodes(doc.layers.sector, doc.blocks.sector),
    arena: normalizeCodes(doc.layers.arena, doc.blocks.arena),
    game_object: normalizeCodes(doc.layers.game_object, doc.blocks.game_object),
    spawning_location: normalizeCodes(doc.layers.spawning_location, doc.blocks.spawning_location),
  };
  return { ...doc, layers };
}

/**
 * YAML reads an unquoted `01` as the number 1. A numeric code resolves to the
 * block key with the same numeric value when its plain string form is not a
 * key itself, so `01` still finds a block keyed "01".
 */
function normalizeCodes(codes: Array<string | number>, table: Record<string, string>): string[] {
  const byValue = new Map<number, string>();
  for (const key of Object.keys(table)) {
    const value = Number(key);
    if (key.trim() !== "" && Number.isFinite(value) && !byValue.has(value)) byValue.set(value, key);
  }
  return codes.map((code) => {
    if (typeof code === "string") return code;
    const text = String(code);
    if (Object.hasOwn(table, text)) return text;
    return byValue.get(code) ?? text;
  });
}

function parseCsv(content: string): string[][] {
  return content
    .split(/\r?\n/)
    .filter((line) => line.trim().length > 0)
    .map((line) => line.split(",").map((cell) => cell.trim()));
}

async function readBlockTable(path: string, layer: string): Promise<Record<string, string>> {
  const table: Record<string, string> = {};
  for (const row of parseCsv(await readText(path, { layer, file: path }))) {
    const code = row[0];
    const name = row[row.length - 1];
    if (code === undefined || name === undefined) continue;
    table[code] = name;
  }
  return table;
}

async function readLayer(path: string, layer: string): Promise<string[]> {
  const first = parseCsv(await readText(path, { layer, file: path }))[0];
  if (!first) throw new ConfigError(`Layer "${layer}" file is empty: ${path}`, { layer, file: path });
  return first;
}

function parseMeta(raw: unknown, path: string): WorldMeta {
  if (typeof raw !== "object" || raw === null) {
    throw new ConfigError(`Invalid meta info at "${path}": expected an object`, { file: path });
  }
  const meta: Record<string, unknown> = { ...raw };
  const int = (field: string): number => {
    const value = Number(meta[field]);
    if (!Number.isInteger(value)) {
      throw new ConfigError(`Invalid meta info at "${path}": ${field} must be an integer`, { file: path, field });
    }
    return value;
  };
  return {
    width: int("maze_width"),
    height: int("maze_height"),
    tile_size: int("sq_tile_size"),
    special_constraint: meta.special_constraint,
  };
}

/**
 * Reads the matrix directory layout:
 *
 *   maze_meta_info.json
 *   special_blocks/world_blocks.csv, {sector,arena,game_object,spawning_location}_blocks.csv
 *   maze/{collision,sector,arena,game_object,spawning_location}_maze.csv
 *
 * Block tables map the first column (code) to the last column (name). Each
 * maze file holds every cell, row-major, on its first line.
 */
export async function loadMatrixDirectory(dir: string): Promise<WorldConfig> {
  const metaPath = join(dir, "maze_meta_info.json");
  let metaRaw: unknown;
  try {
    metaRaw = JSON.parse(await readText(metaPath, { file: metaPath }));
  } catch (err) {
    if (err instanceof ConfigError) throw err;
    throw new ConfigError(`Invalid meta info at "${metaPath}": ${err instanceof Error ? err.message : String(err)}`, {
      file: metaPath,
    });
  }
  const meta = parseMeta(metaRaw, metaPath);

  const blocksDir = join(dir, "special_blocks");
  const worldPath = join(blocksDir, "world_blocks.csv");
  const worldRow = parseCsv(await readText(worldPath, { layer: "world", file: worldPath }))[0];
  const worldName = worldRow?.[worldRow.length - 1];
  if (!worldName) throw new ConfigError(`World block file has no world name: ${worldPath}`, { layer: "world", file: worldPath });

  const block = (layer: BlockLayerName) => readBlockTable(join(blocksDir, BLOCK_FILES[layer]), layer);
  const blocks: WorldConfig["blocks"] = {
    sector: await block("sector"),
    arena: await block("arena"),
    game_object: await block("game_object"),
    spawning_location: await block("spawning_location"),
  };

  const mazeDir = join(dir, "maze");
  const layer = (name: LayerName) => readLayer(join(mazeDir, LAYER_FILES[name]), name);
  const layers: WorldConfig["layers"] = {
    collision: await layer("collision"),
    sector: await layer("sector"),
    arena: await layer("arena"),
    game_object: await layer("game_object"),
    spawning_location: await layer("spawning_location"),
  };

  return { meta, world_name: worldName, layers, blocks };
}
