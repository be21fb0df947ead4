import { existsSync, readFileSync } from "node:fs";
import { join, resolve as resolvePath } from "node:path";
import { z } from "zod";

export const CONFIG_FILE_NAME = "s2t.config.json";

const configSchema = z.object({
  connection: z.string().optional(),
  schema: z.string().min(1).optional(),
  output: z.string().optional(),
  primaryKeyAttribute: z
    .object({ namespace: z.string().min(1), key: z.string().min(1) })
    .optional(),
});

export type CliConfig = z.infer<typeof configSchema>;

/**
 * Find and read the CLI config file. An explicit path wins; otherwise the
 * current directory and up to two parents are searched (so the CLI also
 * finds the repo config when run from packages/cli).
 */
export function loadConfig(explicitPath?: string, cwd: string = process.cwd()): CliConfig {
  if (explicitPath) {
    const path = resolvePath(cwd, explicitPath);
    if (existsSync(path)) {
      return readConfigFile(path);
    }
    return {};
  }

  const candidates = [
    join(cwd, CONFIG_FILE_NAME),
    join(cwd, "..", CONFIG_FILE_NAME),
    join(cwd, "..", "..", CONFIG_FILE_NAME),
  ];
  for (const path of candidates) {
    if (existsSync(path)) {
      return readConfigFile(path);
    }
  }

  return {};
}

function readConfigFile(path: string): CliConfig {
  try {
    const raw = readFileSync(path, "utf8");
    return configSchema.parse(JSON.parse(raw));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    // eslint-disable-next-line no-console
    console.error(`Failed to read config from ${path}, ignoring it: ${reason}`);
    return {};
  }
}
