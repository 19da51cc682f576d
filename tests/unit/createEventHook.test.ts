import { describe, expect, it, vi } from "vitest";

import { createEventHook } from "@/events/hooks/createEventHook";

describe("createEventHook", () => {
  it("runs listeners in subscription order", async () => {
    const hook = createEventHook<[string]>();
    const calls: string[] = [];
    hook.on((value) => {
      calls.push(`a:${value}`);
    });
    hook.on(async (value) => {
      calls.push(`b:${value}`);
    });

    await hook.emit("x");
    expect(calls).toEqual(["a:x", "b:x"]);
  });

  it("keeps going after a listener throws", async () => {
    const hook = createEventHook<[number]>({ name: "test" });
    const errors = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const after = vi.fn();
    hook.on(() => {
      throw new Error("boom");
    });
    hook.on(after);

    await hook.emit(1);
    expect(after).toHaveBeenCalledWith(1);
    expect(errors).toHaveBeenCalledTimes(1);
    expect(errors.mock.calls[0]?.[0]).toBe("[hooks:test] listener failed");
    errors.mockRestore();
  });

  it("unsubscribes through on, once, off and clear", async () => {
    const hook = createEventHook<[]>();
    const kept = vi.fn();
    const unsubscribed = vi.fn();
    const single = vi.fn();
    const removed = vi.fn();

    hook.on(kept);
    const stop = hook.on(unsubscribed);
    hook.once(single);
    hook.on(removed);
    stop();
    hook.off(removed);

    await hook.emit();
    await hook.emit();
    expect(kept).toHaveBeenCalledTimes(2);
    expect(single).toHaveBeenCalledTimes(1);
    expect(unsubscribed).not.toHaveBeenCalled();
    expect(removed).not.toHaveBeenCalled();

    hook.clear();
    await hook.emit();
    expect(kept).toHaveBeenCalledTimes(2);
  });
});
