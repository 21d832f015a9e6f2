import type { RuntimeEnv } from "../runtime.js";

/**
 * `--host <name>` from the dynamic inventory protocol. Host variables are
 * already served through `_meta.hostvars`, so the answer is always empty.
 */
export function hostCommand(runtime: RuntimeEnv): void {
  runtime.log("{}");
}
