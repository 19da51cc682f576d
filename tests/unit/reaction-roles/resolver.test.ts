/**
 * Assignment resolver: mode rules, gates and menu selections.
 */
import { describe, expect, it } from "vitest";
import {
  resolve,
  resolveMenuSelection,
  type ActivationKind,
  type Binding,
  type Outcome,
  type RoleMessage,
} from "@/modules/reaction-roles";

import { binding, reactionMessage, roleMessage } from "./_fakes";

type Plan = { add: string[]; remove: string[] } | { rejected: string };

function plan(outcome: Outcome): Plan {
  if (outcome.kind === "rejected") return { rejected: outcome.reason };
  return { add: [...outcome.add].sort(), remove: [...outcome.remove].sort() };
}

function activate(
  target: RoleMessage,
  trigger: string,
  memberRoles: string[],
  kind: ActivationKind = "select",
  guildMessages: RoleMessage[] = [target],
): Plan {
  return plan(
    resolve({ memberRoles: new Set(memberRoles), guildMessages, target, trigger, kind }),
  );
}

/** Applies a plan to a role list, the way the platform would. */
function apply(roles: string[], result: Plan): string[] {
  if ("rejected" in result) return roles;
  const next = new Set(roles);
  for (const roleId of result.remove) next.delete(roleId);
  for (const roleId of result.add) next.add(roleId);
  return [...next].sort();
}

describe("resolve: normal mode", () => {
  const message = reactionMessage("m1", {
    "🔴": binding("red"),
    "🔵": binding("blue"),
  });

  it("toggles a role on and off with repeated selects", () => {
    const first = activate(message, "🔴", []);
    expect(first).toEqual({ add: ["red"], remove: [] });

    const held = apply([], first);
    expect(held).toEqual(["red"]);

    const second = activate(message, "🔴", held);
    expect(second).toEqual({ add: [], remove: ["red"] });
    expect(apply(held, second)).toEqual([]);
  });

  it("keeps other normal roles when adding one", () => {
    expect(activate(message, "🔵", ["red"])).toEqual({ add: ["blue"], remove: [] });
  });

  it("removes only the target on deselect", () => {
    expect(activate(message, "🔴", ["red", "blue"], "deselect")).toEqual({
      add: [],
      remove: ["red"],
    });
  });

  it("does nothing when deselecting a role the member lacks", () => {
    expect(activate(message, "🔴", ["blue"], "deselect")).toEqual({ add: [], remove: [] });
  });

  it("rejects unknown triggers", () => {
    expect(activate(message, "🟢", [])).toEqual({ rejected: "missing_binding" });
  });

  it("rejects orphaned bindings", () => {
    const orphaned = reactionMessage("m2", { "🔴": binding("red", "normal", { orphaned: true }) });
    expect(activate(orphaned, "🔴", [])).toEqual({ rejected: "missing_binding" });
  });

  it("rejects everything on a stale message", () => {
    const stale = { ...message, stale: true };
    expect(activate(stale, "🔴", [])).toEqual({ rejected: "missing_binding" });
    expect(activate(stale, "🔴", ["red"], "deselect")).toEqual({ rejected: "missing_binding" });
  });
});

describe("resolve: unique mode", () => {
  const message = reactionMessage("m1", {
    "🥇": binding("gold", "unique"),
    "🥈": binding("silver", "unique"),
  });

  it("swaps the unique role in one outcome", () => {
    const first = activate(message, "🥇", []);
    expect(first).toEqual({ add: ["gold"], remove: [] });

    const second = activate(message, "🥈", apply([], first));
    expect(second).toEqual({ add: ["silver"], remove: ["gold"] });
    expect(apply(["gold"], second)).toEqual(["silver"]);
  });

  it("leaves roles bound on other messages alone", () => {
    const other = reactionMessage("m2", { "⭐": binding("star", "unique") });
    const result = activate(message, "🥇", ["star"], "select", [message, other]);
    expect(result).toEqual({ add: ["gold"], remove: [] });
  });
});

describe("resolve: exclusive mode", () => {
  const factions = reactionMessage("m1", {
    "⚔️": binding("faction-a", "exclusive"),
    "🛡️": binding("faction-b", "exclusive"),
  });
  const news = reactionMessage("m2", { "📰": binding("subscriber") });
  const guild = [factions, news];

  it("drops every other bound role in the guild", () => {
    const result = activate(factions, "⚔️", ["subscriber"], "select", guild);
    expect(result).toEqual({ add: ["faction-a"], remove: ["subscriber"] });
    expect(apply(["subscriber"], result)).toEqual(["faction-a"]);
  });

  it("switches between exclusive roles", () => {
    expect(activate(factions, "🛡️", ["faction-a"], "select", guild)).toEqual({
      add: ["faction-b"],
      remove: ["faction-a"],
    });
  });

  it("drops a held exclusive role when another bound role is added", () => {
    expect(activate(news, "📰", ["faction-a"], "select", guild)).toEqual({
      add: ["subscriber"],
      remove: ["faction-a"],
    });
  });

  it("ignores roles no message binds", () => {
    expect(activate(factions, "⚔️", ["unrelated"], "select", guild)).toEqual({
      add: ["faction-a"],
      remove: [],
    });
  });
});

describe("resolve: gates", () => {
  const capped = reactionMessage(
    "m1",
    {
      "1️⃣": binding("one"),
      "2️⃣": binding("two"),
      "3️⃣": binding("three"),
    },
    { settings: { requiredRoles: [], maxRoles: 1 } },
  );

  it("rejects a select past the cap and changes nothing", () => {
    const result = activate(capped, "2️⃣", ["one"]);
    expect(result).toEqual({ rejected: "cap_reached" });
    expect(apply(["one"], result)).toEqual(["one"]);
  });

  it("still lets the member toggle off a held role at the cap", () => {
    expect(activate(capped, "1️⃣", ["one"])).toEqual({ add: [], remove: ["one"] });
  });

  it("counts only roles bound by the target message", () => {
    expect(activate(capped, "2️⃣", ["elsewhere"])).toEqual({ add: ["two"], remove: [] });
  });

  const gated = reactionMessage(
    "m2",
    { "🎮": binding("gamer") },
    { settings: { requiredRoles: ["verified", "member"], maxRoles: null } },
  );

  it("requires one of the required roles to select", () => {
    expect(activate(gated, "🎮", [])).toEqual({ rejected: "missing_required_role" });
    expect(activate(gated, "🎮", ["member"])).toEqual({ add: ["gamer"], remove: [] });
  });

  it("does not gate deselects", () => {
    expect(activate(gated, "🎮", ["gamer"], "deselect")).toEqual({ add: [], remove: ["gamer"] });
  });
});

describe("resolveMenuSelection", () => {
  const menu = roleMessage("menu-1", "menu", {
    categories: [
      {
        id: "pronouns",
        name: "Pronouns",
        emoji: null,
        description: null,
        bindings: [binding("he"), binding("she"), binding("they")],
      },
      {
        id: "color",
        name: "Color",
        emoji: null,
        description: null,
        bindings: [binding("red", "unique"), binding("blue", "unique")],
      },
    ],
  });

  function select(categoryId: string, memberRoles: string[], desired: string[], target = menu) {
    return plan(
      resolveMenuSelection({
        memberRoles: new Set(memberRoles),
        guildMessages: [target],
        target,
        categoryId,
        desired,
      }),
    );
  }

  it("moves the member to the desired selection", () => {
    expect(select("pronouns", ["she"], ["he", "they"])).toEqual({
      add: ["he", "they"],
      remove: ["she"],
    });
  });

  it("clears the category when nothing is selected", () => {
    expect(select("pronouns", ["he", "red"], [])).toEqual({ add: [], remove: ["he"] });
  });

  it("keeps one unique role, the later pick winning", () => {
    expect(select("color", [], ["red", "blue"])).toEqual({ add: ["blue"], remove: [] });
    expect(select("color", ["red"], ["blue"])).toEqual({ add: ["blue"], remove: ["red"] });
  });

  it("lets an exclusive pick win whatever the option order", () => {
    const factions = (bindings: Binding[]) =>
      roleMessage("menu-2", "menu", {
        categories: [{ id: "side", name: "Side", emoji: null, description: null, bindings }],
      });
    const fireFirst = factions([binding("fire", "exclusive"), binding("water")]);
    const waterFirst = factions([binding("water"), binding("fire", "exclusive")]);

    expect(select("side", [], ["fire", "water"], fireFirst)).toEqual({ add: ["fire"], remove: [] });
    expect(select("side", [], ["fire", "water"], waterFirst)).toEqual({ add: ["fire"], remove: [] });
  });

  it("ignores values outside the category", () => {
    expect(select("pronouns", [], ["red", "intruder"])).toEqual({ add: [], remove: [] });
  });

  it("rejects unknown categories", () => {
    expect(select("missing", [], ["he"])).toEqual({ rejected: "missing_binding" });
  });

  it("applies the cap to the final selection", () => {
    const capped = { ...menu, settings: { requiredRoles: [], maxRoles: 2 } };
    expect(select("pronouns", ["he"], ["he", "she", "they"], capped)).toEqual({
      rejected: "cap_reached",
    });
    expect(select("pronouns", ["he"], ["she", "they"], capped)).toEqual({
      add: ["she", "they"],
      remove: ["he"],
    });
  });

  it("gates additions but not removals on required roles", () => {
    const gated = { ...menu, settings: { requiredRoles: ["verified"], maxRoles: null } };
    expect(select("pronouns", ["he"], [], gated)).toEqual({ add: [], remove: ["he"] });
    expect(select("pronouns", ["he"], ["she"], gated)).toEqual({
      rejected: "missing_required_role",
    });
  });
});
