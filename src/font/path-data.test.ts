import { describe, test, expect } from "vitest";
import { FontDataError } from "../core/errors";
import { parsePathData, validateParams } from "./path-data";

describe("parsePathData", () => {
  test("splits commands and parameters", () => {
    expect(parsePathData("M10 20L30 40Z")).toEqual([
      { command: "M", params: [10, 20] },
      { command: "L", params: [30, 40] },
      { command: "Z", params: [] },
    ]);
  });

  test("reads compact numbers", () => {
    expect(parsePathData("M1e2,-.5")).toEqual([{ command: "M", params: [100, -0.5] }]);
    expect(parsePathData("m0-1")).toEqual([{ command: "m", params: [0, -1] }]);
    expect(parsePathData("M0.5.5")).toEqual([{ command: "M", params: [0.5, 0.5] }]);
  });

  test("keeps repeated parameter groups on one step", () => {
    expect(parsePathData("M0 0L1 2 3 4")[1]).toEqual({ command: "L", params: [1, 2, 3, 4] });
  });

  test("empty data has no steps", () => {
    expect(parsePathData("   ")).toEqual([]);
  });

  test("rejects bad data", () => {
    expect(() => parsePathData("10 20")).toThrow(FontDataError);
    expect(() => parsePathData("M0 0K1 1")).toThrow('Unsupported path command "K"');
    expect(() => parsePathData("M0 0L1")).toThrow('"L" takes parameters in groups of 2, got 1');
    expect(() => parsePathData("M0 0Z1")).toThrow('"Z" takes no parameters, got 1');
  });
});

describe("validateParams", () => {
  test("requires at least one group", () => {
    expect(() => validateParams("C", [])).toThrow(FontDataError);
    expect(() => validateParams("C", [1, 2, 3, 4, 5, 6])).not.toThrow();
  });

  test("rejects non-finite values", () => {
    expect(() => validateParams("H", [Number.NaN])).toThrow('"H" has a non-numeric parameter');
  });
});
