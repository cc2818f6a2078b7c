import dotenv from "dotenv";
import fs from "fs";
import { resolve } from "path";
import { getPackageJson } from "./package";

/**
 * Loads config/.env.<NODE_ENV>, falling back to config/.env
 */
(function initEnv() {
  const folder = process.env.ENV_FILE_FOLDER || resolve(process.cwd(), "config");
  const candidates = [process.env.NODE_ENV ? `.env.${process.env.NODE_ENV}` : null, ".env"];
  const envFile = candidates
    .filter((name): name is string => name !== null)
    .map((name) => resolve(folder, name))
    .find((file) => fs.existsSync(file));

  if (envFile) dotenv.config({ path: envFile });
  process.env.APP_VERSION = getPackageJson().version;
})();

export default process.env;
