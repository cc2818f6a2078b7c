import EventEmitter from "events";
import type ffmpeg from "fluent-ffmpeg";
import logger from "@/logger";
import FfpmegUtils from "@/utils/ffmpeg";
import type { VideoCapture, VideoCaptureEvents } from "@/types/tiktok";

/** Copies a live pull URL to a file with ffmpeg until stopped. */
export default class FfmpegVideoCapture extends EventEmitter<VideoCaptureEvents> implements VideoCapture {
  private recCommand: ffmpeg.FfmpegCommand | null = null;
  private stopping = false;

  get recording() {
    return this.recCommand !== null;
  }

  start(input: string, output: string) {
    if (this.recCommand) return;

    this.recCommand = FfpmegUtils.rec(input, output);
    this.recCommand
      .once("start", (cmd: string) => logger.debug("[Video Capture]", `ffmpeg started: ${cmd}`))
      .once("error", (err: Error) => {
        this.recCommand = null;
        if (!this.stopping) this.emit("error", err);
      })
      .once("end", () => {
        this.recCommand = null;
        this.emit("end");
      });

    this.recCommand.run();
  }

  stop(): Promise<void> {
    const command = this.recCommand;
    if (!command) return Promise.resolve();
    this.stopping = true;

    return new Promise<void>((resolve) => {
      // a SIGTERM'd ffmpeg reports through "error", a clean exit through "end"
      command.removeAllListeners();
      command.once("error", () => resolve());
      command.once("end", () => resolve());
      command.kill("SIGTERM");
    }).finally(() => {
      this.recCommand = null;
    });
  }

  kill() {
    const command = this.recCommand;
    if (!command) return;
    this.stopping = true;
    command.removeAllListeners();
    command.on("error", (err: Error) => logger.debug("[Video Capture]", `ffmpeg killed: ${err.message}`));
    command.kill("SIGKILL");
    this.recCommand = null;
  }
}
