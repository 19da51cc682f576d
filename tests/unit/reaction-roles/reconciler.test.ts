import { describe, expect, it } from "vitest";
import type { Category } from "@/modules/reaction-roles";

import { binding, CHANNEL, GUILD, roleMessage, setupEngine } from "./_fakes";

const category = (id: string, bindings: Category["bindings"]): Category => ({
  id,
  name: id,
  emoji: null,
  description: null,
  bindings,
});

describe("verify and cleanup", () => {
  it("drops bindings of deleted roles and then finds nothing left to do", async () => {
    const { engine } = await setupEngine([
      roleMessage("m1", "reaction", {
        triggers: {
          "🔥": binding("fire", "normal", { emoji: "🔥" }),
          "💀": binding("gone", "normal", { emoji: "💀" }),
        },
      }),
    ]);

    const before = await engine.verify(GUILD);
    expect(before.issueCount).toBe(1);
    expect(before.messages[0]?.orphanedBindings).toEqual([
      { key: "💀", roleId: "gone", categoryId: null },
    ]);

    const cleaned = await engine.cleanup(GUILD);
    expect(cleaned.removedBindings).toBe(1);
    expect(cleaned.changed).toEqual(["m1"]);
    expect(Object.keys(engine.getRoleMessage(GUILD, "m1")?.triggers ?? {})).toEqual(["🔥"]);

    expect((await engine.verify(GUILD)).issueCount).toBe(0);
    const again = await engine.cleanup(GUILD);
    expect(again.changed).toEqual([]);
    expect(again.removedBindings).toBe(0);
  });

  it("removes menu categories left without live roles", async () => {
    const { engine } = await setupEngine([
      roleMessage("m1", "menu", {
        categories: [category("games", [binding("gone")]), category("art", [binding("chess")])],
      }),
    ]);

    const report = await engine.verify(GUILD);
    expect(report.issueCount).toBe(2);
    expect(report.messages[0]?.emptyCategories).toEqual(["games"]);

    const cleaned = await engine.cleanup(GUILD);
    expect(cleaned.removedBindings).toBe(1);
    expect(cleaned.removedCategories).toBe(1);
    expect(engine.getRoleMessage(GUILD, "m1")?.categories.map((entry) => entry.id)).toEqual(["art"]);
  });

  it("warns about roles above the bot without counting them as issues", async () => {
    const { engine } = await setupEngine([
      roleMessage("m1", "reaction", { triggers: { "👑": binding("admin", "normal", { emoji: "👑" }) } }),
    ]);

    const report = await engine.verify(GUILD);
    expect(report.issueCount).toBe(0);
    expect(report.messages[0]?.unmanageableRoles).toEqual(["admin"]);
  });

  it("fills in the channel of messages stored without one", async () => {
    const { engine } = await setupEngine([roleMessage("m1", "reaction", { channelId: null })]);

    const report = await engine.verify(GUILD);
    expect(report.messages[0]?.locatedChannelId).toBe(CHANNEL);

    const cleaned = await engine.cleanup(GUILD);
    expect(cleaned.backfilledChannels).toBe(1);
    expect(engine.getRoleMessage(GUILD, "m1")?.channelId).toBe(CHANNEL);
  });
});

describe("missing messages", () => {
  it("marks them stale and restores them once they exist again", async () => {
    const { engine, platform } = await setupEngine([
      roleMessage("m1", "reaction", { triggers: { "🔥": binding("fire", "normal", { emoji: "🔥" }) } }),
    ]);
    platform.posted.delete("m1");

    const report = await engine.verify(GUILD);
    expect(report.issueCount).toBe(1);
    expect(report.messages[0]?.messageExists).toBe(false);

    const cleaned = await engine.cleanup(GUILD);
    expect(cleaned.markedStale).toEqual(["m1"]);
    expect(engine.getRoleMessage(GUILD, "m1")?.stale).toBe(true);
    expect((await engine.verify(GUILD)).issueCount).toBe(0);

    const skipped = await engine.rebuild(GUILD);
    expect(skipped.skipped).toEqual([{ messageId: "m1", reason: "missing" }]);

    platform.posted.set("m1", CHANNEL);
    const rebuilt = await engine.rebuild(GUILD);
    expect(rebuilt.restored).toEqual(["m1"]);
    expect(rebuilt.rebuilt).toEqual(["m1"]);
    expect(engine.getRoleMessage(GUILD, "m1")?.stale).toBe(false);
    expect(platform.cleared).toEqual(["m1"]);
    expect(platform.reactions).toEqual(["m1:🔥"]);
  });
});

describe("rebuild", () => {
  it("re-renders buttons and re-registers their routes", async () => {
    const { engine, platform } = await setupEngine([
      roleMessage("m1", "button", { triggers: { fire: binding("fire", "normal", { label: "Fire" }) } }),
    ]);
    engine.registrar.unregisterMessage(GUILD, "m1");

    const report = await engine.rebuild(GUILD);
    expect(report.rebuilt).toEqual(["m1"]);
    expect(platform.edits).toHaveLength(1);
    expect(platform.cleared).toEqual([]);
    expect(engine.registrar.has("rr:b:guild-1:m1:fire")).toBe(true);
  });

  it("reports emoji the platform refuses", async () => {
    const { engine, platform } = await setupEngine([
      roleMessage("m1", "reaction", { triggers: { "🔥": binding("fire", "normal", { emoji: "🔥" }) } }),
    ]);
    platform.failingEmoji.add("🔥");

    const report = await engine.rebuild(GUILD);
    expect(report.rebuilt).toEqual([]);
    expect(report.failures).toEqual([{ messageId: "m1", error: "Could not add 🔥" }]);
  });
});
