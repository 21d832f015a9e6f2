import type { RuntimeEnv } from "../runtime.js";
import type { TunnelProcessCorrelator } from "../tunnels/index.js";
import { createTunnelCorrelator, NO_TUNNELS_MESSAGE } from "./list-tunnels.js";

/**
 * Terminate every tunnel process. Pids that could not be signalled are
 * reported on stderr and do not fail the command.
 */
export async function killTunnelsCommand(
  runtime: RuntimeEnv,
  correlator: Pick<TunnelProcessCorrelator, "killTunnelProcesses"> = createTunnelCorrelator(),
): Promise<void> {
  const { terminated, failed } = await correlator.killTunnelProcesses();
  if (terminated.length === 0 && failed.length === 0) {
    runtime.log(NO_TUNNELS_MESSAGE);
    return;
  }
  for (const pid of terminated) {
    runtime.log(`Terminated tunnel process ${pid}`);
  }
  for (const { pid, reason } of failed) {
    runtime.error(`Could not terminate tunnel process ${pid}: ${reason}`);
  }
}
