export { buildCommand, type BuildCommandDeps } from "./build.js";
export { listTunnelsCommand, formatTunnelLine, createTunnelCorrelator, NO_TUNNELS_MESSAGE } from "./list-tunnels.js";
export { killTunnelsCommand } from "./kill-tunnels.js";
export { hostCommand } from "./host.js";
