import { describe, expect, it } from "vitest";
import { buildRoleMessageView } from "@/modules/reaction-roles";

import { binding, roleMessage } from "./_fakes";

describe("buildRoleMessageView", () => {
  it("lists reaction roles in one embed field", () => {
    const view = buildRoleMessageView(
      roleMessage("m1", "reaction", {
        display: { title: "Colors", description: "Pick one", color: 0xff0000 },
        triggers: {
          "🔴": binding("red", "unique", { emoji: "🔴" }),
          "🔵": binding("blue", "unique", { emoji: "🔵", orphaned: true }),
        },
      }),
    );

    expect(view.embed).toEqual({
      title: "Colors",
      description: "Pick one",
      color: 0xff0000,
      fields: [{ name: "Roles", value: "🔴 <@&red>" }],
    });
    expect(view.buttons).toEqual([]);
    expect(view.menus).toEqual([]);
  });

  it("labels buttons from the binding, the role name or the role id", () => {
    const view = buildRoleMessageView(
      roleMessage("m1", "button", {
        triggers: {
          a: binding("a", "normal", { label: "Alpha" }),
          b: binding("b"),
          c: binding("c"),
          "🔥": binding("d", "normal", { emoji: "🔥" }),
        },
      }),
      new Map([["b", "Beta"]]),
    );

    expect(view.buttons.map((button) => button.label)).toEqual(["Alpha", "Beta", "Role c", null]);
    expect(view.buttons[3]).toEqual({ customId: "rr:b:guild-1:m1:🔥", label: null, emoji: "🔥" });
  });

  it("renders one select per category that has live roles", () => {
    const view = buildRoleMessageView(
      roleMessage("m1", "menu", {
        categories: [
          {
            id: "colors",
            name: "Colors",
            emoji: "🎨",
            description: "Name colors",
            bindings: [binding("red", "unique"), binding("blue", "unique", { description: "Calm" })],
          },
          {
            id: "empty",
            name: "Empty",
            emoji: null,
            description: "Nothing here",
            bindings: [binding("gone", "normal", { orphaned: true })],
          },
          {
            id: "games",
            name: "Games",
            emoji: null,
            description: null,
            bindings: [binding("chess"), binding("go")],
          },
        ],
      }),
      new Map([["red", "Red"]]),
    );

    expect(view.embed.fields).toEqual([{ name: "Colors", value: "Name colors" }]);
    expect(view.menus.map((menu) => [menu.customId, menu.placeholder, menu.maxValues])).toEqual([
      ["rr:m:guild-1:m1:colors", "🎨 Select Colors roles", 1],
      ["rr:m:guild-1:m1:games", "Select Games roles", 2],
    ]);
    expect(view.menus[0]?.options).toEqual([
      { value: "red", label: "Red", description: "Click to toggle this role", emoji: null },
      { value: "blue", label: "Role blue", description: "Calm", emoji: null },
    ]);
  });

  it("renders categories holding an exclusive role as single-select", () => {
    const view = buildRoleMessageView(
      roleMessage("m1", "menu", {
        categories: [
          {
            id: "side",
            name: "Side",
            emoji: null,
            description: null,
            bindings: [binding("fire", "exclusive"), binding("water")],
          },
        ],
      }),
    );
    expect(view.menus[0]?.maxValues).toBe(1);
  });
});
