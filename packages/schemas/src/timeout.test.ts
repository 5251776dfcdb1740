import { describe, it, expect } from "vitest";
import { TimeoutError, withTimeout } from "./timeout.js";

const never = () => new Promise<never>(() => {});

describe("TimeoutError", () => {
  it("carries the label and the timeout", () => {
    const err = new TimeoutError("Inference engine", 250);
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe("TimeoutError");
    expect(err.message).toBe("Inference engine timed out after 250ms");
    expect(err.label).toBe("Inference engine");
    expect(err.timeoutMs).toBe(250);
  });
});

describe("withTimeout", () => {
  it("resolves when the promise completes before the timeout", async () => {
    const result = await withTimeout(Promise.resolve(42), 1000);
    expect(result).toBe(42);
  });

  it("accepts a plain value", async () => {
    const grid = [[0.5, null]];
    await expect(withTimeout(grid, 1000)).resolves.toBe(grid);
  });

  it("rejects with TimeoutError when the promise exceeds the timeout", async () => {
    await expect(withTimeout(never(), 20, "Slow op")).rejects.toThrow(TimeoutError);
    await expect(withTimeout(never(), 20, "Slow op")).rejects.toThrow("Slow op timed out after 20ms");
  });

  it("uses default label when none is provided", async () => {
    await expect(withTimeout(never(), 20)).rejects.toThrow("Operation timed out after 20ms");
  });

  it("passes through rejections from the original promise", async () => {
    const failing = Promise.reject(new Error("original error"));
    await expect(withTimeout(failing, 1000)).rejects.toThrow("original error");
  });

  it("does not time out when ms <= 0", async () => {
    const result = await withTimeout(Promise.resolve("fast"), 0);
    expect(result).toBe("fast");
  });
});
