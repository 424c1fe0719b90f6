export type { CollateralToken } from "./types.js";
export { CollateralRegistry } from "./collateral-registry.js";
export { MemoryCollateralToken } from "./memory-collateral.js";
