// pattern: Functional Core

/**
 * Diagnostic subsystems adrlogs knows how to read, in menu order
 */
export const COMPONENT_KINDS = ["database", "asm", "crs", "listener"] as const;

export type ComponentKind = (typeof COMPONENT_KINDS)[number];

/**
 * What a caller may ask for: one kind, or every kind the host has
 */
export type ComponentSelection = ComponentKind | "all";

// ADR product family directory under <base>/diag for each kind
export const HOME_FAMILY: Record<ComponentKind, string> = {
  database: "rdbms",
  asm: "asm",
  crs: "crs",
  listener: "tnslsnr",
};

// Environment a kind needs, used in capability-mismatch messages
export const REQUIRED_ROLE: Record<ComponentKind, string> = {
  database: "Oracle Database environment",
  asm: "Grid Infrastructure environment",
  crs: "Grid Infrastructure environment",
  listener: "Oracle Net listener environment",
};

/**
 * Substring whose presence in a home listing marks the kind as available
 */
export function capabilityMarker(kind: ComponentKind): string {
  return `diag/${HOME_FAMILY[kind]}`;
}

/**
 * Match a relative ADR home path (diag/<family>/<instance>/<id>) to its kind
 * @returns The kind, or undefined when the path has none of the four shapes
 */
export function classifyHomePath(relativePath: string): ComponentKind | undefined {
  const segments = relativePath.split("/");
  if (segments.length !== 4 || segments[0] !== "diag") {
    return undefined;
  }

  const [, family, instance, instanceId] = segments;
  if (!instance || !instanceId || /\s/.test(instance + instanceId)) {
    return undefined;
  }

  return COMPONENT_KINDS.find(kind => HOME_FAMILY[kind] === family);
}

/**
 * Validate a command line component token, case-insensitively
 * @returns The selection, or undefined for an unknown token
 */
export function parseComponentToken(
  token: string
): ComponentSelection | undefined {
  const normalized = token.trim().toLowerCase();
  if (normalized === "all") {
    return "all";
  }
  return COMPONENT_KINDS.find(kind => kind === normalized);
}

/**
 * Expand a selection to the concrete kinds it stands for
 */
export function expandSelection(
  selection: ComponentSelection
): readonly ComponentKind[] {
  return selection === "all" ? COMPONENT_KINDS : [selection];
}
