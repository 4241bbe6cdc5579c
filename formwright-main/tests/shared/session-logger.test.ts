import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { logModelFailure, logStateCommit } from "../../src/shared/session-logger.js";
import { devLog, isDebugEnabled } from "../../src/shared/debug-log.js";

describe("session logging", () => {
  const originalDebug = process.env["FORMWRIGHT_DEBUG"];

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    if (originalDebug === undefined) {
      delete process.env["FORMWRIGHT_DEBUG"];
    } else {
      process.env["FORMWRIGHT_DEBUG"] = originalDebug;
    }
  });

  it("stays silent unless FORMWRIGHT_DEBUG=1", () => {
    delete process.env["FORMWRIGHT_DEBUG"];

    logStateCommit("watch", 1, 1);
    devLog("hidden");

    expect(isDebugEnabled()).toBe(false);
    expect(console.log).not.toHaveBeenCalled();
  });

  it("prints a tagged line with its detail when enabled", () => {
    process.env["FORMWRIGHT_DEBUG"] = "1";

    logModelFailure("do", "Request timed out.");

    expect(console.log).toHaveBeenCalledOnce();
    const line = String(vi.mocked(console.log).mock.calls[0]?.[0]);
    expect(line).toContain("[SESSION]");
    expect(line).toContain("Model call FAILED");
    expect(line).toContain('"Request timed out."');
    expect(line).toContain('"do"');
  });
});
