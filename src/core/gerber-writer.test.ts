import { describe, test, expect } from "vitest";
import { GerberWriter } from "./gerber-writer";

describe("GerberWriter", () => {
  test("moves and draws", () => {
    const w = new GerberWriter();
    w.moveTo({ x: 1, y: -2 });
    w.drawTo({ x: 3.5, y: 0 });
    expect(w.getLines()).toEqual(["X001000000Y-002000000D02*", "X003500000Y000000000D01*"]);
  });

  test("region closes back to the first vertex", () => {
    const w = new GerberWriter();
    w.region([
      { x: 0, y: 0 },
      { x: 1, y: 0 },
      { x: 1, y: 1 },
    ]);
    expect(w.getLines()).toEqual([
      "G36*",
      "X000000000Y000000000D02*",
      "X001000000Y000000000D01*",
      "X001000000Y001000000D01*",
      "X000000000Y000000000D01*",
      "G37*",
    ]);
  });

  test("region already closed is not closed twice", () => {
    const w = new GerberWriter();
    w.region([
      { x: 0, y: 0 },
      { x: 1, y: 0 },
      { x: 1, y: 1 },
      { x: 0, y: 0 },
    ]);
    expect(w.getLines().filter((l) => l === "X000000000Y000000000D01*")).toHaveLength(1);
  });

  test("empty region writes nothing", () => {
    const w = new GerberWriter();
    w.region([]);
    expect(w.toString()).toBe("");
  });

  test("polarity directives", () => {
    const w = new GerberWriter();
    w.polarity("clear");
    w.polarity("dark");
    expect(w.toString()).toBe("%LPC*%\n%LPD*%\n");
  });
});
