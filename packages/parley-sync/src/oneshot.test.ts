// Tests for the one-shot slot

import { describe, it, expect } from "vitest";
import { oneshot } from "./oneshot.ts";
import { SyncError } from "./errors.ts";

describe("oneshot", () => {
  it("delivers a value sent before recv", async () => {
    const [tx, rx] = oneshot<number>();
    expect(tx.send(5)).toEqual({ ok: true });
    await expect(rx.recv()).resolves.toBe(5);
  });

  it("wakes a recv that is already waiting", async () => {
    const [tx, rx] = oneshot<string>();
    const pending = rx.recv();
    tx.send("late");
    await expect(pending).resolves.toBe("late");
  });

  it("carries undefined as a real value", async () => {
    const [tx, rx] = oneshot<undefined>();
    tx.send(undefined);
    await expect(rx.recv()).resolves.toBeUndefined();
  });

  it("hands the value back when the receiver is closed", () => {
    const [tx, rx] = oneshot<number>();
    rx.close();
    expect(tx.isClosed()).toBe(true);
    expect(tx.send(7)).toEqual({ ok: false, value: 7 });
  });

  it("rejects a second send", () => {
    const [tx] = oneshot<number>();
    tx.send(1);
    expect(() => tx.send(2)).toThrow(SyncError);
  });

  it("reports canceled when the sender closes first", async () => {
    const [tx, rx] = oneshot<number>();
    tx.close();
    await expect(rx.recv()).rejects.toMatchObject({ kind: "canceled" });
  });

  it("reports canceled to a waiting recv", async () => {
    const [tx, rx] = oneshot<number>();
    const pending = rx.recv();
    tx.close();
    await expect(pending).rejects.toMatchObject({ kind: "canceled" });
  });

  it("ignores close after send", async () => {
    const [tx, rx] = oneshot<number>();
    tx.send(3);
    tx.close();
    await expect(rx.recv()).resolves.toBe(3);
  });

  it("allows recv only once", async () => {
    const [tx, rx] = oneshot<number>();
    tx.send(1);
    await rx.recv();
    await expect(rx.recv()).rejects.toMatchObject({ kind: "consumed" });
  });

  it("rejects a pending recv when the receiver closes", async () => {
    const [tx, rx] = oneshot<number>();
    const pending = rx.recv();
    rx.close();
    await expect(pending).rejects.toMatchObject({ kind: "released" });
    expect(tx.send(1)).toEqual({ ok: false, value: 1 });
  });
});
