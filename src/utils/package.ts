import fs from "fs";
import path from "path";
import { z } from "zod";

const packageJsonSchema = z.object({ name: z.string(), version: z.string() });

export function getPackageJson() {
  const packageJsonPath = path.resolve(__dirname, "../../package.json");
  return packageJsonSchema.parse(JSON.parse(fs.readFileSync(packageJsonPath, "utf-8")));
}
