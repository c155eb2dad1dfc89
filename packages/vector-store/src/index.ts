export type { IVectorIndex } from "./vector-store.interface.js";
export { FlatL2Index } from "./flat-index.js";
export { buildIndex, DEFAULT_BATCH_SIZE } from "./build.js";
export type { BuildIndexOptions } from "./build.js";
export { squaredL2 } from "./distance.js";
