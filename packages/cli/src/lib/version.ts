import path from "path";
import fs from "fs";
import JSON5 from "json5";
import { z } from "zod";

const PackageJson = z.object({ version: z.string() }).passthrough();

export function getPackageJson(): z.infer<typeof PackageJson> | undefined {
  const maxDepth = 5;
  let depth = 0;
  let currentDir = path.resolve(__dirname);
  while (depth < maxDepth && currentDir !== "/" && currentDir) {
    const packageJson = path.join(currentDir, "package.json");
    if (fs.existsSync(packageJson)) {
      const parsed = PackageJson.safeParse(JSON5.parse(fs.readFileSync(packageJson, "utf8")));
      return parsed.success ? parsed.data : undefined;
    }
    currentDir = path.resolve(currentDir, "..");
    depth++;
  }
  return undefined;
}

export const cliVersion = process.env.PII_INGEST_VERSION || getPackageJson()?.version || "0.0.0";

export const displayVersion = cliVersion === "0.0.0" ? "LOCAL.DEV.VERSION" : cliVersion;
