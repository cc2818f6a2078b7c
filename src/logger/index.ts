import Log4js from "log4js";
import path from "path";

type LoggerOptions = {
  logDir: string;
  verbose?: boolean;
};

/**
 * Until this runs log4js keeps its default config (level OFF), so modules can
 * import the loggers freely in tests.
 */
export function setupLogger({ logDir, verbose = false }: LoggerOptions) {
  const dateFile = (filename: string) => ({
    type: "dateFile" as const,
    filename: path.join(logDir, filename),
    encoding: "utf-8",
    pattern: "yyyy-MM-dd",
    maxLogSize: 10485760,
    numBackups: 2,
    keepFileExt: true,
    alwaysIncludePattern: true,
    compress: true,
  });

  Log4js.configure({
    appenders: {
      out: { type: "stdout" },
      app: dateFile("monitor.log"),
      http: dateFile("http.log"),
    },
    categories: {
      default: { appenders: ["out", "app"], level: verbose ? "debug" : "info" },
      http: { appenders: ["http"], level: "debug" },
    },
  });

  console.log("\x1B[4m" + "TikTok Live Monitor Version: " + "\x1B[31m" + process.env.APP_VERSION + "\x1B[0m" + "\n");
}

export function shutdownLogger() {
  return new Promise<void>((resolve) => Log4js.shutdown(() => resolve()));
}

export default Log4js.getLogger("app");
export const httpLogger = Log4js.getLogger("http");
