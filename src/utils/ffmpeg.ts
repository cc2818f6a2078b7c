import ffmpeg from "fluent-ffmpeg";
import path from "path";

const FFMPEG_BIN_FOLDER = process.env.FFMPEG_BIN_FOLDER;
if (FFMPEG_BIN_FOLDER) {
  ffmpeg.setFfmpegPath(path.join(FFMPEG_BIN_FOLDER, "./ffmpeg"));
  ffmpeg.setFfprobePath(path.join(FFMPEG_BIN_FOLDER, "./ffprobe"));
}

function addNecessaryInfo(cmd: ffmpeg.FfmpegCommand): ffmpeg.FfmpegCommand {
  return cmd.addInputOption(
    "-headers",
    "User-Agent: Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/132.0.0.0 Safari/537.36\r\nReferer: https://www.tiktok.com/"
  );
}

const FfpmegUtils = {
  rec(input: string, output: string): ffmpeg.FfmpegCommand {
    return addNecessaryInfo(ffmpeg(input))
      .addInputOption("-rw_timeout", String(30 * 1e6))
      .output(output)
      .outputOptions("-c copy");
  },
};

export default FfpmegUtils;
