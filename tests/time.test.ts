import { describe, it, expect } from "vitest";
import { formatTimestamp, renderCommitMessage } from "../src/util/time.js";

describe("formatTimestamp", () => {
  it("renders wall-clock time in the requested zone", () => {
    const instant = new Date("2024-03-01T12:00:00Z");
    expect(formatTimestamp(instant, "Asia/Tehran")).toBe("2024-03-01 15:30:00");
    expect(formatTimestamp(instant, "UTC")).toBe("2024-03-01 12:00:00");
  });

  it("uses a 24-hour clock starting at 00", () => {
    expect(formatTimestamp(new Date("2024-03-01T00:00:00Z"), "UTC")).toBe("2024-03-01 00:00:00");
    expect(formatTimestamp(new Date("2024-07-04T16:05:09Z"), "America/New_York")).toBe("2024-07-04 12:05:09");
  });
});

describe("renderCommitMessage", () => {
  it("fills the timestamp slot", () => {
    expect(renderCommitMessage("✅ {timestamp} ✅", new Date("2024-03-01T12:00:00Z"), "Asia/Tehran")).toBe(
      "✅ 2024-03-01 15:30:00 ✅",
    );
  });
});
