import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";

import type { SessionConfig } from "../../types/sessionTypes";
import { ConfigError } from "../utils/errors";
import { createSessionConfig, parseConfigInput } from "./sessionConfig";


const isMissing = (err: unknown) =>
   err instanceof Error && "code" in err && err.code === "ENOENT";

/**
 * Load a JSON settings file over the defaults.
 * Missing file -> defaults. Unreadable JSON or bad fields -> ConfigError.
 */
export async function loadSettingsFile(path: string): Promise<SessionConfig> {
   let text: string;
   try {
      text = await readFile(path, "utf-8");
   } catch (err) {
      if (isMissing(err)) return createSessionConfig();
      throw err;
   }

   let raw: unknown;
   try {
      raw = JSON.parse(text);
   } catch (err) {
      throw new ConfigError([{ field: "(file)", message: `${path} is not valid JSON: ${String(err)}` }]);
   }
   return createSessionConfig(parseConfigInput(raw));
}

/** Write via a temp file, then rename over the target. */
export async function saveSettingsFile(path: string, config: SessionConfig): Promise<void> {
   await mkdir(dirname(path), { recursive: true });
   const tmp = path + ".tmp";
   await writeFile(tmp, JSON.stringify(config, null, 2), "utf-8");
   await rename(tmp, path);
}
