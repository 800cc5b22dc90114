import { describe, expect, it } from "vitest";
import { ErrorCode } from "../errors/codes.js";
import { inferSeverity, isRetryableSeverity } from "../errors/severity.js";
import { createId } from "../utils/id.js";

describe("inferSeverity", () => {
  it("should treat timeouts as low severity", () => {
    expect(inferSeverity(ErrorCode.HOOK_TIMEOUT)).toBe("low");
    expect(isRetryableSeverity(inferSeverity(ErrorCode.PROVIDER_STREAM_FAILED))).toBe(true);
  });

  it("should treat permission and tool failures as medium", () => {
    expect(inferSeverity(ErrorCode.PERMISSION_DENIED)).toBe("medium");
    expect(inferSeverity(ErrorCode.TOOL_EXECUTION_FAILED)).toBe("medium");
  });

  it("should treat budget breaches as high", () => {
    expect(inferSeverity(ErrorCode.BUDGET_EXCEEDED)).toBe("high");
    expect(isRetryableSeverity("high")).toBe(false);
  });

  it("should fall back to critical", () => {
    expect(inferSeverity(ErrorCode.INTERNAL_ERROR)).toBe("critical");
  });
});

describe("createId", () => {
  it("should prefix ids when asked", () => {
    expect(createId("req")).toMatch(/^req_[0-9a-f-]{36}$/);
    expect(createId()).toMatch(/^[0-9a-f-]{36}$/);
  });

  it("should not repeat", () => {
    expect(createId()).not.toBe(createId());
  });
});
