export { WorldGrid } from "./world-grid.js";
export type { Tile, WorldGridOptions } from "./world-grid.js";
export {
  EventSet,
  makeEvent,
  makeIdleEvent,
  isIdleEvent,
  eventKey,
  eventsEqual,
} from "./grid-event.js";
export type { ReadonlyEventSet } from "./grid-event.js";
export { SPAWN_NAMESPACE, spawnAddress, joinAddress, addressLeaf } from "./address.js";
export { loadWorldConfigFile, loadMatrixDirectory } from "./config-loader.js";
