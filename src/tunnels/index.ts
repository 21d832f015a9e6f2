export { TunnelLauncher, buildTunnelArgs, TUNNEL_RESOURCE_PORT, type TunnelRequest } from "./launcher.js";
export {
  TunnelProcessCorrelator,
  TUNNEL_COMMAND_TOKENS,
  isTunnelCommandLine,
} from "./processes.js";
export {
  LinuxProcessTable,
  PsProcessTable,
  createProcessTable,
  parsePsOutput,
  parseStatState,
  statusFromStateLetter,
  type ProcessTable,
} from "./process-table.js";
