import type { KnowledgeRule, Player, RoleDefinition, Sighting, VisibilityMap } from "./types";
import { getRole } from "./roles";

type SightingRule = (viewer: RoleDefinition, target: RoleDefinition) => Sighting;

const unknown: SightingRule = () => "unknown";

/**
 * One rule per knowledge tag. Each rule only reads catalog flags so that adding
 * a role is a data change.
 */
const RULES: Record<KnowledgeRule, SightingRule> = {
  sees_all_evil_except_one: (_viewer, target) =>
    target.alignment === "evil" && !target.hiddenFromSeer ? "evil" : "unknown",
  sees_evil_team: (_viewer, target) =>
    target.alignment === "evil" && !target.hiddenFromEvil ? "evil" : "unknown",
  sees_merlin_ambiguous_with_one_decoy: (_viewer, target) =>
    target.seerCandidate ? "ambiguous_good_candidate" : "unknown",
  no_special_knowledge: unknown
};

/** Sighting of `target` from `viewer`'s seat, derived from their dealt roles. */
export function sightingFor(viewer: Player, target: Player): Sighting {
  if (!viewer.role || !target.role) return "unknown";
  const viewerRole = getRole(viewer.role);
  return RULES[viewerRole.knowledge](viewerRole, getRole(target.role));
}

/**
 * Computes every player's private knowledge of every other player.
 * Pure: the same dealt roles always give the same map, so it is computed once at
 * assignment and stored rather than re-derived per request.
 */
export function computeVisibility(players: readonly Player[]): VisibilityMap {
  // fromEntries defines own keys, so any seat id (even "__proto__") stays a plain entry.
  return Object.fromEntries(
    players.map(viewer => [
      viewer.playerId,
      Object.fromEntries(
        players
          .filter(target => target.playerId !== viewer.playerId)
          .map(target => [target.playerId, sightingFor(viewer, target)])
      )
    ])
  );
}
