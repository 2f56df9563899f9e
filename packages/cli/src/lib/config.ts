import os from "os";
import path from "path";
import dotenv from "dotenv";
import { z } from "zod";
import { stringifyZodError } from "@pii-ingest/protocol";

export function untildify(filePath: string): string {
  const home = process.env.HOME || os.homedir() || "/";
  if (filePath.startsWith("~")) {
    return path.join(home, filePath.slice(1));
  }
  return filePath;
}

/**
 * Loads .env, .env.local and .env.$NODE_ENV from the given directory, then every extra file
 */
export function configureEnvVars(dir: string | undefined, envFiles: string[]) {
  const envFileNames = [".env", ".env.local"];
  if (process.env.NODE_ENV) {
    envFileNames.push(`.env.${process.env.NODE_ENV}`);
  }
  const paths: string[] = [];
  if (dir) {
    for (const envFileName of envFileNames) {
      paths.push(path.join(dir, envFileName));
    }
  }
  paths.push(...envFiles);
  dotenv.config({
    path: paths.map(untildify),
  });
}

export const EnvConfig = z.object({
  PII_INGEST_ENDPOINT: z.string().url().optional(),
  PII_INGEST_ACCESS_TOKEN: z.string().min(1).optional(),
});

export type EnvConfig = z.infer<typeof EnvConfig>;

export function readEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const { success, error, data } = EnvConfig.safeParse({
    PII_INGEST_ENDPOINT: env.PII_INGEST_ENDPOINT || undefined,
    PII_INGEST_ACCESS_TOKEN: env.PII_INGEST_ACCESS_TOKEN || undefined,
  });
  if (!success) {
    throw new Error(`Invalid environment configuration: ${stringifyZodError(error)}`);
  }
  return data;
}
