import { describe, it, expect } from "vitest";
import { KeyedLock } from "./keyed-lock.js";

describe("keyed-lock.ts — 키별 직렬화", () => {
  it("같은 키의 작업은 순서대로 하나씩 실행", async () => {
    const lock = new KeyedLock();
    const order: string[] = [];
    let release: () => void = () => undefined;
    const gate = new Promise<void>((r) => {
      release = r;
    });

    const first = lock.run("a", async () => {
      order.push("first:start");
      await gate;
      order.push("first:end");
    });
    const second = lock.run("a", () => {
      order.push("second");
    });

    await Promise.resolve();
    expect(order).toEqual(["first:start"]);
    release();
    await Promise.all([first, second]);
    expect(order).toEqual(["first:start", "first:end", "second"]);
  });

  it("다른 키는 서로 기다리지 않음", async () => {
    const lock = new KeyedLock();
    let release: () => void = () => undefined;
    const blocked = lock.run("a", () => new Promise<void>((r) => (release = r)));

    await expect(lock.run("b", () => 42)).resolves.toBe(42);
    release();
    await blocked;
  });

  it("실패한 작업이 뒤 작업을 막지 않음", async () => {
    const lock = new KeyedLock();
    const failed = lock.run("a", () => {
      throw new Error("boom");
    });
    const next = lock.run("a", () => "ok");

    await expect(failed).rejects.toThrow("boom");
    await expect(next).resolves.toBe("ok");
  });
});
