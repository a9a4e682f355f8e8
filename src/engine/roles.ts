import { ConfigError, type Alignment, type RoleDefinition, type RoleName } from "./types";
import { MAX_PLAYERS, MIN_PLAYERS } from "./rules";

const BASE: Omit<RoleDefinition, "name" | "label" | "alignment" | "knowledge"> = {
  unique: true,
  required: false,
  hiddenFromSeer: false,
  hiddenFromEvil: false,
  seerCandidate: false,
  assassinationTarget: false,
  canAssassinate: false,
  requires: null
};

/** The static role table. Visibility and assassination read these flags, never role names. */
export const ROLE_CATALOG: Readonly<Record<RoleName, RoleDefinition>> = {
  merlin: {
    ...BASE,
    name: "merlin",
    label: "Merlin",
    alignment: "good",
    knowledge: "sees_all_evil_except_one",
    required: true,
    seerCandidate: true,
    assassinationTarget: true
  },
  percival: {
    ...BASE,
    name: "percival",
    label: "Percival",
    alignment: "good",
    knowledge: "sees_merlin_ambiguous_with_one_decoy"
  },
  loyal_servant: {
    ...BASE,
    name: "loyal_servant",
    label: "Loyal Servant of Arthur",
    alignment: "good",
    knowledge: "no_special_knowledge",
    unique: false
  },
  assassin: {
    ...BASE,
    name: "assassin",
    label: "Assassin",
    alignment: "evil",
    knowledge: "sees_evil_team",
    required: true,
    canAssassinate: true
  },
  morgana: {
    ...BASE,
    name: "morgana",
    label: "Morgana",
    alignment: "evil",
    knowledge: "sees_evil_team",
    seerCandidate: true,
    requires: "percival"
  },
  mordred: {
    ...BASE,
    name: "mordred",
    label: "Mordred",
    alignment: "evil",
    knowledge: "sees_evil_team",
    hiddenFromSeer: true
  },
  oberon: {
    ...BASE,
    name: "oberon",
    label: "Oberon",
    alignment: "evil",
    knowledge: "no_special_knowledge",
    hiddenFromEvil: true
  },
  minion: {
    ...BASE,
    name: "minion",
    label: "Minion of Mordred",
    alignment: "evil",
    knowledge: "sees_evil_team",
    unique: false
  }
};

// Index 0 is a five-player table.
const EVIL_COUNTS = [2, 2, 3, 3, 3, 4] as const;

const DEFAULT_ROLE_SETS: Readonly<Record<number, readonly RoleName[]>> = {
  5: ["merlin", "percival", "loyal_servant", "assassin", "minion"],
  6: ["merlin", "percival", "loyal_servant", "loyal_servant", "assassin", "morgana"],
  7: ["merlin", "percival", "loyal_servant", "loyal_servant", "assassin", "morgana", "minion"],
  8: ["merlin", "percival", "loyal_servant", "loyal_servant", "loyal_servant", "assassin", "morgana", "minion"],
  9: [
    "merlin",
    "percival",
    "loyal_servant",
    "loyal_servant",
    "loyal_servant",
    "loyal_servant",
    "assassin",
    "morgana",
    "mordred"
  ],
  10: [
    "merlin",
    "percival",
    "loyal_servant",
    "loyal_servant",
    "loyal_servant",
    "loyal_servant",
    "assassin",
    "morgana",
    "mordred",
    "oberon"
  ]
};

export function isRoleName(value: string): value is RoleName {
  return Object.prototype.hasOwnProperty.call(ROLE_CATALOG, value);
}

export function getRole(name: RoleName): RoleDefinition {
  return ROLE_CATALOG[name];
}

export function alignmentOf(name: RoleName): Alignment {
  return ROLE_CATALOG[name].alignment;
}

function assertSupportedCount(playerCount: number): void {
  if (!Number.isInteger(playerCount) || playerCount < MIN_PLAYERS || playerCount > MAX_PLAYERS) {
    throw new ConfigError(
      "UNSUPPORTED_PLAYER_COUNT",
      `Player count must be between ${MIN_PLAYERS} and ${MAX_PLAYERS}, got ${playerCount}`
    );
  }
}

/** Number of evil seats the catalog requires for a table size. */
export function evilCountFor(playerCount: number): number {
  assertSupportedCount(playerCount);
  return EVIL_COUNTS[playerCount - MIN_PLAYERS];
}

/** Recommended role set for a table size; always passes `validateRoles`. */
export function defaultRoles(playerCount: number): RoleName[] {
  assertSupportedCount(playerCount);
  return [...DEFAULT_ROLE_SETS[playerCount]];
}

/**
 * Validates a requested role list for a table and narrows it to catalog names.
 * Throws ConfigError describing the first violated rule.
 */
export function validateRoles(playerCount: number, requested: readonly string[]): RoleName[] {
  assertSupportedCount(playerCount);
  if (requested.length !== playerCount) {
    throw new ConfigError(
      "ROLE_COUNT_MISMATCH",
      `Expected ${playerCount} roles, got ${requested.length}`
    );
  }

  const roles: RoleName[] = [];
  for (const name of requested) {
    if (!isRoleName(name)) {
      throw new ConfigError("UNKNOWN_ROLE", `Unknown role "${name}"`);
    }
    roles.push(name);
  }

  const counts = new Map<RoleName, number>();
  for (const name of roles) {
    counts.set(name, (counts.get(name) ?? 0) + 1);
  }

  for (const role of Object.values(ROLE_CATALOG)) {
    const count = counts.get(role.name) ?? 0;
    if (role.unique && count > 1) {
      throw new ConfigError("DUPLICATE_UNIQUE_ROLE", `${role.label} may appear only once`);
    }
    if (role.required && count !== 1) {
      throw new ConfigError("MISSING_REQUIRED_ROLE", `${role.label} is required`);
    }
    if (count > 0 && role.requires && !counts.has(role.requires)) {
      throw new ConfigError(
        "ROLE_DEPENDENCY",
        `${role.label} requires ${ROLE_CATALOG[role.requires].label}`
      );
    }
  }

  const evil = roles.filter(name => alignmentOf(name) === "evil").length;
  const expectedEvil = evilCountFor(playerCount);
  if (evil !== expectedEvil) {
    throw new ConfigError(
      "ALIGNMENT_SPLIT",
      `A ${playerCount}-player game needs ${playerCount - expectedEvil} good and ${expectedEvil} evil roles`
    );
  }
  return roles;
}
