/**
 * ReactionRoleEngine end to end against the in-process platform and backend.
 */
import { describe, expect, it } from "vitest";
import { ConfigurationError, type ReactionRoleEngine } from "@/modules/reaction-roles";

import { binding, CHANNEL, GUILD, MEMBER, roleMessage, setupEngine as setup } from "./_fakes";

const press = (engine: ReactionRoleEngine, customId: string, values: string[] = []) =>
  engine.registrar.dispatch({ customId, guildId: GUILD, memberId: MEMBER, values });

describe("ReactionRoleEngine: reaction messages", () => {
  it("posts a message and binds an emoji to a role", async () => {
    const { engine, platform } = await setup();

    const created = await engine.createRoleMessage({
      guildId: GUILD,
      channelId: CHANNEL,
      style: "reaction",
    });
    expect(created.messageId).toBe("posted-1");
    expect(created.display.title).toBe("Reaction Roles");
    expect(platform.posted.get("posted-1")).toBe(CHANNEL);

    const result = await engine.addBinding(GUILD, "posted-1", { roleId: "fire", emoji: "🔥" });
    expect(result.key).toBe("🔥");
    expect(result.refreshError).toBeNull();
    expect(result.failedReactions).toEqual([]);
    expect(platform.reactions).toEqual(["posted-1:🔥"]);
    expect(platform.edits.at(-1)?.view.embed.fields).toEqual([
      { name: "Roles", value: "🔥 <@&fire>" },
    ]);
  });

  it("toggles the role on repeated selects", async () => {
    const { engine, platform } = await setup([
      roleMessage("m1", "reaction", { triggers: { "🔥": binding("fire", "normal", { emoji: "🔥" }) } }),
    ]);

    const first = await engine.onTriggerSelected(GUILD, "m1", "🔥", MEMBER);
    expect(first).toMatchObject({ status: "applied", added: ["fire"], removed: [] });
    expect(platform.held()).toEqual(["fire"]);

    const second = await engine.onTriggerSelected(GUILD, "m1", "🔥", MEMBER);
    expect(second).toMatchObject({ status: "applied", added: [], removed: ["fire"] });
    expect(platform.held()).toEqual([]);
  });

  it("rejects unknown messages before touching the platform", async () => {
    const { engine, platform } = await setup();
    const report = await engine.onTriggerSelected(GUILD, "nope", "🔥", MEMBER);
    expect(report).toEqual({ status: "rejected", reason: "missing_binding" });
    expect(platform.roleCalls).toEqual([]);
  });

  it("reports members that left the guild", async () => {
    const { engine } = await setup([
      roleMessage("m1", "reaction", { triggers: { "🔥": binding("fire") } }),
    ]);
    const report = await engine.onTriggerSelected(GUILD, "m1", "🔥", "ghost");
    expect(report).toEqual({ status: "unavailable", reason: "member_not_found" });
  });

  it("collects per-role platform failures", async () => {
    const { engine, platform } = await setup([
      roleMessage("m1", "reaction", { triggers: { "🔥": binding("fire") } }),
    ]);
    platform.forbiddenRoles.add("fire");

    const report = await engine.onTriggerSelected(GUILD, "m1", "🔥", MEMBER);
    expect(report.status).toBe("applied");
    if (report.status !== "applied") return;
    expect(report.added).toEqual([]);
    expect(report.failures).toHaveLength(1);
    expect(report.failures[0]?.roleId).toBe("fire");
    expect(report.failures[0]?.error.code).toBe("forbidden");
  });

  it("refuses roles the bot cannot assign and leaves the message untouched", async () => {
    const { engine } = await setup([roleMessage("m1", "reaction")]);

    await expect(
      engine.addBinding(GUILD, "m1", { roleId: "admin", emoji: "👑" }),
    ).rejects.toMatchObject({ code: "role_not_manageable" });
    expect(engine.getRoleMessage(GUILD, "m1")?.triggers).toEqual({});
  });

  it("rejects text that is not an emoji", async () => {
    const { engine } = await setup([roleMessage("m1", "reaction")]);
    const attempt = engine.addBinding(GUILD, "m1", { roleId: "fire", emoji: "fire" });
    await expect(attempt).rejects.toBeInstanceOf(ConfigurationError);
    await expect(attempt).rejects.toMatchObject({ code: "invalid_input" });
  });

  it("removes a trigger by role and clears its reactions", async () => {
    const { engine, platform } = await setup([
      roleMessage("m1", "reaction", {
        triggers: {
          "🔥": binding("fire", "normal", { emoji: "🔥" }),
          "💧": binding("water", "normal", { emoji: "💧" }),
        },
      }),
    ]);

    const result = await engine.removeBinding(GUILD, "m1", { roleId: "fire" });
    expect(Object.keys(result.message.triggers)).toEqual(["💧"]);
    expect(platform.cleared).toEqual(["m1"]);
    expect(platform.reactions).toEqual(["m1:💧"]);
  });

  it("updates limits and required roles", async () => {
    const { engine } = await setup([roleMessage("m1", "reaction")]);

    await engine.updateSettings(GUILD, "m1", { maxRoles: 2, addRequiredRole: "vip" });
    const { message } = await engine.updateSettings(GUILD, "m1", { addRequiredRole: "mod" });
    expect(message.settings).toEqual({ requiredRoles: ["vip", "mod"], maxRoles: 2 });

    const cleared = await engine.updateSettings(GUILD, "m1", {
      maxRoles: null,
      clearRequiredRoles: true,
    });
    expect(cleared.message.settings).toEqual({ requiredRoles: [], maxRoles: null });
  });

  it("keeps configuring while the backend refuses writes", async () => {
    const { engine, backend, store } = await setup([roleMessage("m1", "reaction")]);
    backend.failWrites = true;

    await engine.addBinding(GUILD, "m1", { roleId: "fire", emoji: "🔥" });
    expect(engine.getRoleMessage(GUILD, "m1")?.triggers["🔥"]?.roleId).toBe("fire");
    expect(store.pendingCount()).toBe(1);

    backend.failWrites = false;
    expect(await engine.flush()).toEqual({ attempted: 1, flushed: 1, failed: 0 });
  });
});

describe("ReactionRoleEngine: buttons and menus", () => {
  it("routes a new button straight to the member's roles", async () => {
    const { engine, platform } = await setup();
    await engine.createRoleMessage({ guildId: GUILD, channelId: CHANNEL, style: "button" });

    const result = await engine.addBinding(GUILD, "posted-1", { roleId: "fire", label: "Fire" });
    expect(result.key).toBe("fire");

    const customId = "rr:b:guild-1:posted-1:fire";
    expect(engine.registrar.has(customId)).toBe(true);
    expect(platform.edits.at(-1)?.view.buttons).toEqual([
      { customId, label: "Fire", emoji: null },
    ]);

    const report = await press(engine, customId);
    expect(report).toMatchObject({ status: "applied", added: ["fire"] });
    expect(platform.held()).toEqual(["fire"]);
  });

  it("routes a menu category once it has a role", async () => {
    const { engine, platform } = await setup();
    await engine.createRoleMessage({ guildId: GUILD, channelId: CHANNEL, style: "menu" });

    const { categoryId } = await engine.addCategory(GUILD, "posted-1", { name: "Games" });
    expect(categoryId).toBe("games");
    expect(engine.registrar.size).toBe(0);

    await engine.addMenuBinding(GUILD, "posted-1", "Games", { roleId: "chess" });
    const customId = "rr:m:guild-1:posted-1:games";
    expect(engine.registrar.has(customId)).toBe(true);

    expect(await press(engine, customId, ["chess"])).toMatchObject({
      status: "applied",
      added: ["chess"],
    });
    expect(await press(engine, customId, [])).toMatchObject({
      status: "applied",
      removed: ["chess"],
    });
    expect(platform.held()).toEqual([]);
  });

  it("refuses menu operations on reaction messages", async () => {
    const { engine } = await setup([roleMessage("m1", "reaction")]);
    await expect(engine.addCategory(GUILD, "m1", { name: "Games" })).rejects.toMatchObject({
      code: "style_mismatch",
    });
  });

  it("rebuilds routes from stored configuration at startup", async () => {
    const { engine } = await setup([
      roleMessage("m1", "button", { triggers: { fire: binding("fire", "normal", { label: "Fire" }) } }),
      roleMessage("m2", "button", {
        stale: true,
        triggers: { water: binding("water", "normal", { label: "Water" }) },
      }),
    ]);
    expect(engine.registrar.size).toBe(1);
    expect(engine.registrar.has("rr:b:guild-1:m1:fire")).toBe(true);
  });
});

describe("ReactionRoleEngine: platform drift", () => {
  it("marks deleted messages stale and stops routing them", async () => {
    const { engine } = await setup([
      roleMessage("m1", "button", { triggers: { fire: binding("fire", "normal", { label: "Fire" }) } }),
    ]);

    expect(await engine.markMessageDeleted(GUILD, "m1")).toBe(true);
    expect(await engine.markMessageDeleted(GUILD, "m1")).toBe(false);
    expect(engine.getRoleMessage(GUILD, "m1")?.stale).toBe(true);
    expect(engine.registrar.size).toBe(0);
    expect(await engine.onTriggerSelected(GUILD, "m1", "fire", MEMBER)).toEqual({
      status: "rejected",
      reason: "missing_binding",
    });
  });

  it("orphans bindings of deleted roles", async () => {
    const { engine } = await setup([
      roleMessage("m1", "button", {
        triggers: {
          fire: binding("fire", "normal", { label: "Fire" }),
          water: binding("water", "normal", { label: "Water" }),
        },
      }),
    ]);

    expect(await engine.markRoleDeleted(GUILD, "fire")).toBe(1);
    expect(await engine.markRoleDeleted(GUILD, "fire")).toBe(0);
    expect(engine.getRoleMessage(GUILD, "m1")?.triggers.fire?.orphaned).toBe(true);
    expect(engine.registrar.has("rr:b:guild-1:m1:fire")).toBe(false);
    expect(engine.registrar.has("rr:b:guild-1:m1:water")).toBe(true);
  });

  it("forgets a role message on delete", async () => {
    const { engine, backend } = await setup([
      roleMessage("m1", "button", { triggers: { fire: binding("fire", "normal", { label: "Fire" }) } }),
    ]);

    expect(await engine.deleteRoleMessage(GUILD, "m1")).toBe(true);
    expect(engine.getRoleMessage(GUILD, "m1")).toBeNull();
    expect(backend.docs.size).toBe(0);
    expect(engine.registrar.size).toBe(0);
    await expect(engine.deleteRoleMessage(GUILD, "m1")).rejects.toMatchObject({
      code: "unknown_message",
    });
  });
});

describe("ReactionRoleEngine: clone and export", () => {
  it("posts a copy with the same bindings", async () => {
    const { engine, platform } = await setup([
      roleMessage("m1", "reaction", { triggers: { "🔥": binding("fire", "unique", { emoji: "🔥" }) } }),
    ]);

    const result = await engine.clone(GUILD, "m1", "channel-2");
    expect(result.message.messageId).toBe("posted-1");
    expect(result.message.channelId).toBe("channel-2");
    expect(result.message.triggers["🔥"]).toEqual(binding("fire", "unique", { emoji: "🔥" }));
    expect(platform.reactions).toEqual(["posted-1:🔥"]);
    expect(engine.list(GUILD).map((message) => message.messageId)).toEqual(["m1", "posted-1"]);
  });

  it("exports a versioned snapshot", async () => {
    const { engine } = await setup([roleMessage("m1", "reaction")]);
    const snapshot = engine.export(GUILD);
    expect(snapshot.version).toBe(2);
    expect(snapshot.guildId).toBe(GUILD);
    expect(snapshot.exportedAt).toBe("2024-05-01T12:00:00.000Z");
    expect(snapshot.messages.map((message) => message._id)).toEqual(["guild-1:m1"]);
  });
});
