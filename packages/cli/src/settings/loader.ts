// pattern: Functional Core
import { readFile } from "node:fs/promises";
import { homedir } from "node:os";
import { extname, join } from "node:path";

import { parse as parseYaml } from "yaml";

import { ajv } from "../utils/ajv.js";
import { ConfigurationError, ValidationError } from "../utils/errors.js";

import { DEFAULT_SETTINGS, type Settings, SettingsFile } from "./schema.js";

// Compile schema once for reuse
const validateSettingsFile = ajv.compile<SettingsFile>(SettingsFile);

/**
 * Default settings file location: $ADRLOGS_CONFIG, then ~/.adrlogs.yaml
 */
export function defaultSettingsPath(env: NodeJS.ProcessEnv = process.env): string {
  const fromEnv = env["ADRLOGS_CONFIG"];
  if (fromEnv) {
    return fromEnv;
  }
  return join(homedir(), ".adrlogs.yaml");
}

/**
 * Parse settings file content by extension (.json, .yaml/.yml)
 */
export function parseSettingsContent(content: string, filePath: string): unknown {
  const ext = extname(filePath).toLowerCase();

  try {
    switch (ext) {
      case ".json":
        return JSON.parse(content);
      case ".yaml":
      case ".yml":
        return parseYaml(content);
      default:
        throw new ConfigurationError(
          `Unsupported settings format: ${ext || "(none)"}. Supported formats: .json, .yaml, .yml`,
          filePath
        );
    }
  } catch (error) {
    if (error instanceof ConfigurationError) {
      throw error;
    }
    const detail = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(
      `Could not parse settings file ${filePath}: ${detail}`,
      filePath
    );
  }
}

/**
 * Validates a parsed settings object against the schema
 */
export function validateSettings(data: unknown): SettingsFile {
  // An empty YAML document parses to null
  const candidate = data ?? {};
  if (!validateSettingsFile(candidate)) {
    const errors = (validateSettingsFile.errors ?? []).map(
      err => `${err.instancePath || "root"}: ${err.message ?? "invalid"}`
    );
    throw new ValidationError(
      `Settings validation failed: ${errors.join(", ")}`,
      errors
    );
  }
  return candidate;
}

/**
 * Overlay a validated settings file on the defaults
 */
export function resolveSettings(file: SettingsFile): Settings {
  return {
    ...DEFAULT_SETTINGS,
    ...file,
    filterPatterns: file.filterPatterns ?? DEFAULT_SETTINGS.filterPatterns,
  };
}

/**
 * Load settings. A missing file at the default location yields the defaults;
 * a missing file that was named explicitly is an error.
 */
export async function loadSettings(
  filePath: string,
  explicit: boolean
): Promise<Settings> {
  let content: string;
  try {
    content = await readFile(filePath, "utf8");
  } catch (error) {
    const code: unknown =
      error instanceof Error ? Reflect.get(error, "code") : undefined;
    if (code === "ENOENT" && !explicit) {
      return { ...DEFAULT_SETTINGS };
    }
    const detail = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(
      `Could not read settings file ${filePath}: ${detail}`,
      filePath
    );
  }

  return resolveSettings(validateSettings(parseSettingsContent(content, filePath)));
}
