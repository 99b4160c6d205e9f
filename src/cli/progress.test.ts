import { describe, it, expect } from "vitest";
import { describeFailure, describeState } from "./progress";

describe("describeState", () => {
  it("names the session being calibrated", () => {
    expect(
      describeState({ phase: "calibrating", session: "/data/night-2", index: 2, total: 3 }),
    ).toBe("Calibrating session 2/3: /data/night-2 ...");
  });

  it("describes the merge and stack phases", () => {
    expect(describeState({ phase: "merging" })).toBe("Merging sessions together ...");
    expect(describeState({ phase: "stacking" })).toBe("Stacking merged sessions ...");
  });
});

describe("describeFailure", () => {
  it("points at the phase that failed", () => {
    expect(describeFailure(undefined)).toBe("Pipeline failed before starting");
    expect(
      describeFailure({ phase: "calibrating", session: "/data/night-1", index: 1, total: 2 }),
    ).toBe("Calibration failed for session /data/night-1");
    expect(describeFailure({ phase: "merging" })).toBe("Pipeline failed while merging");
    expect(describeFailure({ phase: "stacking" })).toBe("Pipeline failed while stacking");
  });
});
