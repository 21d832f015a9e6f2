export { AzureBastionManager, createBastionManager } from "./manager.js";
export type { BastionHost } from "./types.js";
