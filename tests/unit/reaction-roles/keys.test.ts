import { describe, expect, it } from "vitest";
import {
  decodeComponentId,
  encodeComponentId,
  isReactionRoleComponentId,
  normalizeTriggerKey,
  parseEmoji,
  parseHexColor,
  slugifyCategoryId,
} from "@/modules/reaction-roles";

describe("normalizeTriggerKey", () => {
  it("uses the id of custom emoji and the text of unicode emoji", () => {
    expect(normalizeTriggerKey({ id: "123456789012345678", name: "party" })).toBe(
      "123456789012345678",
    );
    expect(normalizeTriggerKey({ id: null, name: "🔥" })).toBe("🔥");
  });

  it("maps configured emoji strings onto the same keys", () => {
    expect(normalizeTriggerKey("<:party:123456789012345678>")).toBe("123456789012345678");
    expect(normalizeTriggerKey("<a:dance:987654321098765432>")).toBe("987654321098765432");
    expect(normalizeTriggerKey(" 🔥 ")).toBe("🔥");
  });

  it("returns an empty key for nothing", () => {
    expect(normalizeTriggerKey(null)).toBe("");
    expect(normalizeTriggerKey({ id: null, name: null })).toBe("");
  });
});

describe("parseEmoji", () => {
  it("parses custom emoji", () => {
    expect(parseEmoji("<:party:123456789012345678>")).toEqual({
      key: "123456789012345678",
      display: "<:party:123456789012345678>",
      custom: true,
    });
  });

  it("accepts unicode emoji", () => {
    expect(parseEmoji("🔥")).toEqual({ key: "🔥", display: "🔥", custom: false });
  });

  it("rejects plain words and sentences", () => {
    expect(parseEmoji("fire")).toBeNull();
    expect(parseEmoji("on fire")).toBeNull();
    expect(parseEmoji("")).toBeNull();
  });
});

describe("component ids", () => {
  it("encodes and decodes button targets", () => {
    const customId = encodeComponentId({ kind: "button", guildId: "g1", messageId: "m1", key: "🔥" });
    expect(customId).toBe("rr:b:g1:m1:🔥");
    expect(decodeComponentId(customId)).toEqual({
      kind: "button",
      guildId: "g1",
      messageId: "m1",
      key: "🔥",
    });
  });

  it("keeps colons inside the key", () => {
    expect(decodeComponentId("rr:m:g1:m1:a:b")).toEqual({
      kind: "menu",
      guildId: "g1",
      messageId: "m1",
      key: "a:b",
    });
  });

  it("rejects foreign or truncated ids", () => {
    expect(decodeComponentId("ticket:close:1")).toBeNull();
    expect(decodeComponentId("rr:x:g1:m1:key")).toBeNull();
    expect(decodeComponentId("rr:b:g1:m1")).toBeNull();
    expect(isReactionRoleComponentId("rr:b:g1:m1:key")).toBe(true);
    expect(isReactionRoleComponentId("autorole:delete:x")).toBe(false);
  });
});

describe("small parsers", () => {
  it("slugifies category names", () => {
    expect(slugifyCategoryId("  Game  Roles: EU ")).toBe("game_roles_eu");
  });

  it("parses hex colours", () => {
    expect(parseHexColor("#ff0000")).toBe(0xff0000);
    expect(parseHexColor("00FF00")).toBe(0x00ff00);
    expect(parseHexColor("red")).toBeNull();
  });
});
