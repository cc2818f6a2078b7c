import logger from "@/logger";
import { withTimeout } from "@/utils/promise";
import { fetchIsLive } from "./api";
import { ProbeTimeout, errorMessage } from "./errors";
import { Tiktok } from "@/types/tiktok";
import type { LiveTarget, LivenessCheck } from "@/types/tiktok";

export const DEFAULT_PROBE_TIMEOUT_MS = 10 * 1000;

export default class LivenessPoller {
  private check: LivenessCheck;

  constructor(check: LivenessCheck = fetchIsLive) {
    this.check = check;
  }

  /**
   * Probes every target concurrently. A probe that errors or outlives
   * `timeoutMs` is `unknown`, never `not_live`.
   */
  async probe(targets: LiveTarget[], timeoutMs = DEFAULT_PROBE_TIMEOUT_MS): Promise<Map<string, Tiktok.Liveness>> {
    const results = new Map<string, Tiktok.Liveness>();
    if (targets.length === 0) return results;

    const pending = targets.map((target) => this.probeOne(target, timeoutMs));
    const outcomes = await Promise.all(pending);

    targets.forEach((target, i) => results.set(target.key, outcomes[i]));

    const unknown = targets.filter((target) => results.get(target.key) === Tiktok.Liveness.UNKNOWN);
    if (unknown.length === targets.length) {
      logger.warn("[Live Monitor]", `all ${targets.length} liveness probes failed, platform may be unreachable`);
    }

    return results;
  }

  private async probeOne(target: LiveTarget, timeoutMs: number): Promise<Tiktok.Liveness> {
    const controller = new AbortController();

    try {
      const live = await withTimeout(this.check(target, controller.signal), timeoutMs, () => {
        controller.abort();
        return new ProbeTimeout(target.key, timeoutMs);
      });

      logger.debug("[Live Monitor]", `${target.username} is ${live ? "live" : "not live"}`);
      return live ? Tiktok.Liveness.LIVE : Tiktok.Liveness.NOT_LIVE;
    } catch (error) {
      logger.warn("[Live Monitor]", `liveness of ${target.username} unknown: ${errorMessage(error)}`);
      return Tiktok.Liveness.UNKNOWN;
    }
  }
}
