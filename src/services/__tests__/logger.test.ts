import { afterEach, describe, expect, it, vi } from "vitest";

import { logWarn, sanitizeLogValue } from "@/services/logger";

describe("sanitizeLogValue", () => {
  it("redacts clipboard text", () => {
    expect(sanitizeLogValue({ text: "secret" })).toEqual({
      text: expect.stringMatching(/^\[redacted-text len=6 hash=[0-9a-f]+\]$/),
    });
    expect(sanitizeLogValue({ clipboardContent: "abc" })).toEqual({
      clipboardContent: expect.stringMatching(/^\[redacted-text len=3 hash=[0-9a-f]+\]$/),
    });
  });

  it("reduces byte arrays to their length", () => {
    expect(sanitizeLogValue({ data: [1, 2, 3] })).toEqual({ data: "[bytes len=3]" });
    expect(sanitizeLogValue(Uint8Array.from([1, 2]))).toBe("[bytes len=2]");
  });

  it("keeps only the base name of paths", () => {
    expect(sanitizeLogValue({ uri: "/tmp/paste-input/paste_1_0.png" })).toEqual({
      uri: expect.stringMatching(/^\[path:paste_1_0\.png dir_hash=[0-9a-f]+\]$/),
    });
    expect(sanitizeLogValue("content://media/external/images/12")).toEqual(
      expect.stringMatching(/^\[path:12 dir_hash=[0-9a-f]+\]$/),
    );
  });

  it("passes plain metadata through", () => {
    expect(sanitizeLogValue({ viewId: 3, ok: true, mimeType: "image/png", kind: "image" })).toEqual({
      viewId: 3,
      ok: true,
      mimeType: "image/png",
      kind: "image",
    });
  });

  it("truncates long strings", () => {
    expect(sanitizeLogValue("x".repeat(300))).toBe(`${"x".repeat(256)}...(truncated,len=300)`);
  });

  it("caps nested depth", () => {
    const nested = { a: { a: { a: { a: { a: { a: { a: { a: 1 } } } } } } } };

    expect(JSON.stringify(sanitizeLogValue(nested))).toBe(
      '{"a":{"a":{"a":{"a":{"a":{"a":{"a":"[max-depth-reached]"}}}}}}}',
    );
  });
});

describe("logWarn", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prints a prefixed line with sanitized metadata", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    logWarn("logger-test", "paste_failed", { viewId: 1, content: "abc" }, "req-1");

    expect(warn).toHaveBeenCalledWith("[warn] [logger-test] [req-1] paste_failed", {
      viewId: 1,
      content: expect.stringMatching(/^\[redacted-text len=3 /),
    });
  });

  it("throttles a burst of identical lines", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    for (let index = 0; index < 25; index += 1) {
      logWarn("logger-burst", "same_line");
    }

    expect(warn).toHaveBeenCalledTimes(20);
  });
});
