// pattern: Functional Core

import { type Static, type TString, Type } from "@sinclair/typebox";

// An absolute filesystem path
const absolutePath = (description: string): TString =>
  Type.String({ minLength: 1, pattern: "^/", description });

/**
 * Per-user settings file (~/.adrlogs.yaml). Every field is optional;
 * resolveSettings() fills in the defaults.
 */
export const SettingsFile = Type.Object(
  {
    adrBase: Type.Optional(
      absolutePath("ADR base directory. Skips the `show base` query when set.")
    ),
    fallbackBase: Type.Optional(
      Type.String({
        minLength: 1,
        description:
          "Base used when adrci cannot report one. {identity} is replaced by the user name.",
        default: "/u01/app/{identity}",
      })
    ),
    adrciPath: Type.Optional(
      absolutePath("Explicit adrci executable; skips the PATH lookup")
    ),
    profilePath: Type.Optional(
      absolutePath("Shell profile sourced for ORACLE_HOME, PATH and ADR_BASE")
    ),
    tailLines: Type.Optional(
      Type.Integer({ minimum: 1, maximum: 100000, default: 100 })
    ),
    filterPatterns: Type.Optional(
      Type.Array(Type.String({ minLength: 1 }), {
        minItems: 1,
        description: "Case-insensitive substrings printed by --grep",
      })
    ),
    archiveDir: Type.Optional(
      absolutePath("Directory the logs_<timestamp>.tar.gz archive is written to")
    ),
    queryTimeoutMs: Type.Optional(
      Type.Integer({ minimum: 100, default: 30000 })
    ),
  },
  { additionalProperties: false }
);
export type SettingsFile = Static<typeof SettingsFile>;

/**
 * Settings after defaults are applied
 */
export interface Settings {
  adrBase?: string;
  fallbackBase: string;
  adrciPath?: string;
  profilePath?: string;
  tailLines: number;
  filterPatterns: string[];
  archiveDir: string;
  queryTimeoutMs: number;
}

export const DEFAULT_SETTINGS: Settings = {
  fallbackBase: "/u01/app/{identity}",
  tailLines: 100,
  filterPatterns: ["error", "warn", "ORA-"],
  archiveDir: "/tmp",
  queryTimeoutMs: 30000,
};
