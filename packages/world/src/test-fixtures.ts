import type { WorldConfig } from "@townsim/schemas";

/**
 * 3x3 "Town": sector "park" everywhere, arena "bench" and object
 * "chessboard" at (1,1), a fountain spawn point at (0,2), a wall at (2,0).
 */
export function townConfig(): WorldConfig {
  return {
    meta: { width: 3, height: 3, tile_size: 1, special_constraint: "" },
    world_name: "Town",
    layers: {
      collision: ["0", "0", "1", "0", "0", "0", "0", "0", "0"],
      sector: ["10", "10", "10", "10", "10", "10", "10", "10", "10"],
      arena: ["0", "0", "0", "0", "20", "0", "0", "0", "0"],
      game_object: ["0", "0", "0", "0", "30", "0", "0", "0", "0"],
      spawning_location: ["0", "0", "0", "0", "0", "0", "40", "0", "0"],
    },
    blocks: {
      sector: { "10": "park" },
      arena: { "20": "bench" },
      game_object: { "30": "chessboard" },
      spawning_location: { "40": "fountain-spawn" },
    },
  };
}
