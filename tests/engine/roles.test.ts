import { describe, it, expect } from "vitest";
import { ROLE_CATALOG, alignmentOf, defaultRoles, evilCountFor, isRoleName, validateRoles } from "../../src/engine/roles";
import * as transitions from "../../src/engine/transitions";
import { ConfigError } from "../../src/engine/types";
import { seededRandom } from "../../src/engine/utils";
import { readyLobby, ruleCode } from "../fixtures";

describe("role catalog", () => {
  it("marks exactly one seer, one assassin and one assassination target", () => {
    const roles = Object.values(ROLE_CATALOG);
    expect(roles.filter(r => r.knowledge === "sees_all_evil_except_one").map(r => r.name)).toEqual(["merlin"]);
    expect(roles.filter(r => r.canAssassinate).map(r => r.name)).toEqual(["assassin"]);
    expect(roles.filter(r => r.assassinationTarget).map(r => r.name)).toEqual(["merlin"]);
    expect(roles.filter(r => r.seerCandidate).map(r => r.name)).toEqual(["merlin", "morgana"]);
  });

  it("recognises catalog names only", () => {
    expect(isRoleName("mordred")).toBe(true);
    expect(isRoleName("toString")).toBe(false);
    expect(alignmentOf("oberon")).toBe("evil");
  });
});

describe("default role sets", () => {
  it("are valid and carry the right evil count for every table size", () => {
    for (let count = 5; count <= 10; count++) {
      const roles = defaultRoles(count);
      expect(validateRoles(count, roles)).toEqual(roles);
      expect(roles.filter(r => alignmentOf(r) === "evil")).toHaveLength(evilCountFor(count));
    }
  });

  it("use the fixed evil split", () => {
    expect([5, 6, 7, 8, 9, 10].map(evilCountFor)).toEqual([2, 2, 3, 3, 3, 4]);
  });
});

describe("validateRoles", () => {
  it("rejects unsupported table sizes", () => {
    expect(() => validateRoles(11, [])).toThrowError(ConfigError);
    expect(ruleCode(() => validateRoles(4, []))).toBe("UNSUPPORTED_PLAYER_COUNT");
  });

  it("names the first violated rule", () => {
    expect(ruleCode(() => validateRoles(5, ["merlin", "assassin"]))).toBe("ROLE_COUNT_MISMATCH");
    expect(ruleCode(() => validateRoles(5, ["merlin", "percival", "jester", "assassin", "minion"]))).toBe(
      "UNKNOWN_ROLE"
    );
    expect(ruleCode(() => validateRoles(5, ["merlin", "percival", "percival", "assassin", "minion"]))).toBe(
      "DUPLICATE_UNIQUE_ROLE"
    );
    expect(
      ruleCode(() => validateRoles(5, ["percival", "loyal_servant", "loyal_servant", "assassin", "minion"]))
    ).toBe("MISSING_REQUIRED_ROLE");
    expect(
      ruleCode(() => validateRoles(5, ["merlin", "loyal_servant", "loyal_servant", "assassin", "morgana"]))
    ).toBe("ROLE_DEPENDENCY");
    expect(ruleCode(() => validateRoles(5, ["merlin", "loyal_servant", "assassin", "minion", "minion"]))).toBe(
      "ALIGNMENT_SPLIT"
    );
  });

  it("allows repeated generic roles", () => {
    const roles = ["merlin", "loyal_servant", "loyal_servant", "loyal_servant", "assassin", "minion"];
    expect(ruleCode(() => validateRoles(6, roles))).toBeUndefined();
  });
});

describe("role assignment", () => {
  it("is a permutation of the configured roles", () => {
    for (const seed of [1, 2, 3]) {
      const game = transitions.startGame(readyLobby(10), seededRandom(seed));
      const dealtRoles = game.players.map(p => p.role ?? "none").sort();
      expect(dealtRoles).toEqual([...game.config.roles].sort());
    }
  });

  it("is reproducible from a seed", () => {
    const first = transitions.startGame(readyLobby(8), seededRandom(42));
    const second = transitions.startGame(readyLobby(8), seededRandom(42));
    expect(first.players.map(p => p.role)).toEqual(second.players.map(p => p.role));
  });
});
