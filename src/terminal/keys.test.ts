import { EventEmitter } from "node:events";
import { afterEach, describe, expect, it, vi } from "vitest";
import { createSilentLogger } from "../logger.js";
import { decodeKey, KeyDecoder, type KeyInputStream } from "./keys.js";

class FakeStream extends EventEmitter implements KeyInputStream {
  resume = vi.fn();
  pause = vi.fn();

  send(data: string): void {
    this.emit("data", Buffer.from(data, "utf8"));
  }
}

describe("decodeKey", () => {
  it("maps single bytes to their keys", () => {
    expect(decodeKey("\r", false)).toEqual({ event: { kind: "enter" }, length: 1 });
    expect(decodeKey("\n", false)).toEqual({ event: { kind: "ctrl_j" }, length: 1 });
    expect(decodeKey("\x7f", false)).toEqual({ event: { kind: "backspace" }, length: 1 });
    expect(decodeKey("\b", false)).toEqual({ event: { kind: "backspace" }, length: 1 });
    expect(decodeKey("\x03", false)).toEqual({ event: { kind: "ctrl_c" }, length: 1 });
    expect(decodeKey("\x10", false)).toEqual({ event: { kind: "ctrl_p" }, length: 1 });
    expect(decodeKey("/", false)).toEqual({ event: { kind: "slash" }, length: 1 });
    expect(decodeKey("\x01", false)).toEqual({ event: { kind: "other", raw: "\x01" }, length: 1 });
  });

  it("decodes only the first key of a longer input", () => {
    expect(decodeKey("hi", false)).toEqual({ event: { kind: "char", char: "h" }, length: 1 });
  });

  it("keeps astral code points whole", () => {
    expect(decodeKey("😀x", false)).toEqual({ event: { kind: "char", char: "😀" }, length: 2 });
  });

  it("decodes CSI and SS3 arrows", () => {
    expect(decodeKey("\x1b[A", false)).toEqual({ event: { kind: "arrow_up" }, length: 3 });
    expect(decodeKey("\x1b[B", false)).toEqual({ event: { kind: "arrow_down" }, length: 3 });
    expect(decodeKey("\x1b[1;5C", false)).toEqual({ event: { kind: "arrow_right" }, length: 6 });
    expect(decodeKey("\x1bOD", false)).toEqual({ event: { kind: "arrow_left" }, length: 3 });
  });

  it("reports other complete sequences verbatim", () => {
    expect(decodeKey("\x1b[3~", false)).toEqual({ event: { kind: "other", raw: "\x1b[3~" }, length: 4 });
    expect(decodeKey("\x1bOP", false)).toEqual({ event: { kind: "other", raw: "\x1bOP" }, length: 3 });
  });

  it("waits on incomplete prefixes unless final", () => {
    expect(decodeKey("\x1b", false)).toBeNull();
    expect(decodeKey("\x1b[", false)).toBeNull();
    expect(decodeKey("\x1b[1;", false)).toBeNull();
    expect(decodeKey("\x1bO", false)).toBeNull();

    expect(decodeKey("\x1b", true)).toEqual({ event: { kind: "escape" }, length: 1 });
    expect(decodeKey("\x1b[1;", true)).toEqual({
      event: { kind: "other", raw: "\x1b[1;" },
      length: 4,
      malformed: true,
    });
    expect(decodeKey("\x1bO", true)).toEqual({ event: { kind: "other", raw: "\x1bO" }, length: 2, malformed: true });
  });

  it("ends a CSI early at a byte outside its grammar", () => {
    expect(decodeKey("\x1b[1\x03", false)).toEqual({
      event: { kind: "other", raw: "\x1b[1" },
      length: 3,
      malformed: true,
    });
  });

  it("treats ESC before an ordinary byte as a lone escape", () => {
    expect(decodeKey("\x1bx", false)).toEqual({ event: { kind: "escape" }, length: 1 });
  });
});

describe("KeyDecoder", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("resumes the stream and yields keys in order", async () => {
    const stream = new FakeStream();
    const decoder = new KeyDecoder(stream, { escapeTimeoutMs: 5 });
    expect(stream.resume).toHaveBeenCalledTimes(1);

    stream.send("a\r");
    await expect(decoder.next()).resolves.toEqual({ kind: "char", char: "a" });
    await expect(decoder.next()).resolves.toEqual({ kind: "enter" });
    decoder.dispose();
  });

  it("joins an escape sequence split across chunks", async () => {
    const stream = new FakeStream();
    const decoder = new KeyDecoder(stream, { escapeTimeoutMs: 50 });

    const pending = decoder.next();
    stream.send("\x1b[");
    stream.send("A");
    await expect(pending).resolves.toEqual({ kind: "arrow_up" });
    decoder.dispose();
  });

  it("joins a multi-byte character split across chunks", async () => {
    const stream = new FakeStream();
    const decoder = new KeyDecoder(stream, { escapeTimeoutMs: 5 });
    const bytes = Buffer.from("é", "utf8");

    const pending = decoder.next();
    stream.emit("data", bytes.subarray(0, 1));
    stream.emit("data", bytes.subarray(1));
    await expect(pending).resolves.toEqual({ kind: "char", char: "é" });
    decoder.dispose();
  });

  it("resolves a lone ESC as escape once the timeout passes", async () => {
    vi.useFakeTimers();
    const stream = new FakeStream();
    const decoder = new KeyDecoder(stream, { escapeTimeoutMs: 25 });

    stream.send("\x1b");
    const pending = decoder.next();
    await vi.advanceTimersByTimeAsync(25);
    await expect(pending).resolves.toEqual({ kind: "escape" });
    decoder.dispose();
  });

  it("logs a sequence cut short by the timeout", async () => {
    const stream = new FakeStream();
    const logger = createSilentLogger();
    const debug = vi.spyOn(logger, "debug");
    const decoder = new KeyDecoder(stream, { escapeTimeoutMs: 5, logger });

    stream.send("\x1b[");
    await expect(decoder.next()).resolves.toEqual({ kind: "other", raw: "\x1b[" });
    expect(debug).toHaveBeenCalledWith({ raw: JSON.stringify("\x1b[") }, "malformed escape sequence");
    decoder.dispose();
  });

  it("rejects a pending read when the signal aborts", async () => {
    const stream = new FakeStream();
    const decoder = new KeyDecoder(stream, { escapeTimeoutMs: 5 });
    const controller = new AbortController();

    const pending = decoder.next(controller.signal);
    controller.abort();
    await expect(pending).rejects.toMatchObject({ name: "AbortError" });

    stream.send("z");
    await expect(decoder.next()).resolves.toEqual({ kind: "char", char: "z" });
    decoder.dispose();
  });

  it("rejects pending and later reads after fail", async () => {
    const stream = new FakeStream();
    const decoder = new KeyDecoder(stream, { escapeTimeoutMs: 5 });
    const failure = new Error("stream broke");

    const pending = decoder.next();
    decoder.fail(failure);
    await expect(pending).rejects.toBe(failure);
    await expect(decoder.next()).rejects.toBe(failure);
    decoder.dispose();
  });

  it("refuses overlapping reads", async () => {
    const stream = new FakeStream();
    const decoder = new KeyDecoder(stream, { escapeTimeoutMs: 5 });

    const first = decoder.next();
    await expect(decoder.next()).rejects.toThrow("another read is pending");
    stream.send("q");
    await expect(first).resolves.toEqual({ kind: "char", char: "q" });
    decoder.dispose();
  });

  it("detaches and pauses on dispose", () => {
    const stream = new FakeStream();
    const decoder = new KeyDecoder(stream, { escapeTimeoutMs: 5 });
    decoder.dispose();
    expect(stream.listenerCount("data")).toBe(0);
    expect(stream.pause).toHaveBeenCalledTimes(1);
  });
});
