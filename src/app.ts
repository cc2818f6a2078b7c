#!/usr/bin/env node
/**
 * TikTok Live Monitor
 */

import bootstrap from "./bootstrap";

import logger, { shutdownLogger } from "./logger";
import ConfigStore from "./lib/tiktok/config-store";
import ControlChannel from "./lib/tiktok/control-channel";
import LivenessPoller from "./lib/tiktok/live-monitor";
import SessionLog from "./lib/tiktok/session-log";
import TiktokLiveOrchestrator from "./lib/tiktok/live-orchestrator";
import TiktokLiveRecorder from "./lib/tiktok/live-recorder";
import FfmpegVideoCapture from "./lib/tiktok/video-capture";
import WebcastEventClient from "./lib/tiktok/webcast-client";
import { toLiveTarget } from "./lib/tiktok/api";
import { ConfigError } from "./lib/tiktok/errors";
import { shutdownManager } from "./utils/shutdown-manager";

const options = bootstrap();

const app = async () => {
  logger.info("[App]", "starting...");

  const sessionLog = new SessionLog("recordings");
  const orchestrator = new TiktokLiveOrchestrator({
    configStore: new ConfigStore(options.configFile, options.overrides),
    control: new ControlChannel({ directory: options.controlDir, defaultPauseSeconds: options.defaultPauseSeconds }),
    poller: new LivenessPoller(),
    sessionLog,
    probeTimeoutMs: options.probeTimeoutMs,
    createRecorder: (account, settings) =>
      new TiktokLiveRecorder({
        account,
        settings,
        client: new WebcastEventClient(toLiveTarget(account, settings), { signServer: settings.signServer }),
        video: new FfmpegVideoCapture(),
        sessionLog,
        connectTimeoutMs: options.connectTimeoutMs,
        finalizeTimeoutMs: options.finalizeTimeoutMs,
      }),
  });

  await orchestrator.init();

  // a connecting session settles its connect first, then four bounded finalize steps
  shutdownManager.timeoutMs = options.connectTimeoutMs + options.finalizeTimeoutMs * 4 + 5000;
  shutdownManager.registerCleanupTask(async (signal) => {
    orchestrator.requestStop(`signal ${signal}`);
    await orchestrator.shutdown();
  });

  await orchestrator.run();
  logger.info("[App]", `monitor stopped: ${orchestrator.stopReason}`);
};

app()
  .then(async () => {
    await shutdownLogger();
    process.exit(0);
  })
  .catch(async (e) => {
    if (e instanceof ConfigError) logger.error("[App]", `cannot start with this config -> ${e.message}`);
    else logger.error("[App Global Catch]", "unhandled error ->", e);
    await shutdownLogger();
    process.exit(1);
  });

if (process.env.NODE_ENV === "production") {
  process.on("uncaughtException", function (e) {
    logger.error("[Global UncaughtException]", "uncaught exception ->", e);
  });
}
