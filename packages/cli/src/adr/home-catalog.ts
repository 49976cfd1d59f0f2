// pattern: Functional Core

import { join } from "node:path";

import {
  classifyHomePath,
  type ComponentKind,
  type ComponentSelection,
} from "./component-kind.js";
import { type Environment, needsExplicitBase } from "./environment-probe.js";

import type { AdrciClient } from "./adrci.js";

/**
 * One ADR home: the diagnostic storage of a single instance
 */
export interface DiagnosticHome {
  kind: ComponentKind;
  // As reported by adrci, e.g. diag/rdbms/orcl/orcl1
  relativePath: string;
  // relativePath resolved against the ADR base
  path: string;
}

/**
 * Classify a `show homes` listing. Header and blank lines match no shape and
 * are dropped; order and duplicates are kept as adrci reported them.
 */
export function parseHomes(
  listing: string,
  selection: ComponentSelection,
  baseDir: string
): DiagnosticHome[] {
  const homes: DiagnosticHome[] = [];

  for (const rawLine of listing.split(/\r?\n/)) {
    const relativePath = rawLine.trim();
    const kind = classifyHomePath(relativePath);
    if (!kind || (selection !== "all" && selection !== kind)) {
      continue;
    }
    homes.push({ kind, relativePath, path: join(baseDir, relativePath) });
  }

  return homes;
}

/**
 * List the homes of a selection, querying adrci afresh
 *
 * @throws QueryFailedError when adrci cannot list homes
 */
export async function listHomes(
  selection: ComponentSelection,
  environment: Environment,
  client: AdrciClient
): Promise<DiagnosticHome[]> {
  const listing = await client.showHomes(
    needsExplicitBase(environment.baseSource) ? environment.baseDir : undefined
  );
  return parseHomes(listing, selection, environment.baseDir);
}

/**
 * Group homes by kind, keeping report order within each kind
 */
export function groupHomesByKind(
  homes: DiagnosticHome[]
): Map<ComponentKind, DiagnosticHome[]> {
  const groups = new Map<ComponentKind, DiagnosticHome[]>();
  for (const home of homes) {
    const group = groups.get(home.kind);
    if (group) {
      group.push(home);
    } else {
      groups.set(home.kind, [home]);
    }
  }
  return groups;
}
