import { describe, test, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdir, mkdtemp, readFile, readdir, rm } from "node:fs/promises";
import { existsSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";

import { Design } from "./design";
import { circle } from "../primitives/circle";
import { line } from "../primitives/line";
import { readArchive } from "../io/archive";
import { MBB, point } from "../types/pcb-model";

describe("Design layer factories", () => {
  test("name layers after the prefix", () => {
    const g = new Design("coil");
    const names = [
      g.topCopper(),
      g.topSolderMask(),
      g.topSilkscreen(),
      g.layerN(2),
      g.layerN(3),
      g.bottomCopper(),
      g.bottomSolderMask(),
      g.bottomSilkscreen(),
      g.drill(),
      g.outline(),
    ].map((l) => l.filename);
    expect(names).toEqual([
      "coil.gtl",
      "coil.gts",
      "coil.gto",
      "coil.g2l",
      "coil.g3l",
      "coil.gbl",
      "coil.gbs",
      "coil.gbo",
      "coil.xln",
      "coil.gko",
    ]);
    expect(g.layers).toHaveLength(10);
  });

  test("inner layers start at 2", () => {
    expect(() => new Design("coil").layerN(1)).toThrow(RangeError);
  });
});

describe("Design.mbb", () => {
  test("unions every layer", async () => {
    const g = new Design("board");
    g.topCopper().add(circle(0, 0, 2));
    g.bottomCopper().add(line(5, 5, 10, 5, "rect", 1));
    const m = await g.mbb();
    expect(m.min).toEqual({ x: -1, y: -1 });
    expect(m.max).toEqual({ x: 10.5, y: 5.5 });
  });

  test("computes once and returns the cached box", async () => {
    const g = new Design("board");
    const top = g.topCopper().add(circle(0, 0, 2));
    const bottom = g.bottomCopper().add(circle(3, 3, 2));
    const topSpy = vi.spyOn(top, "mbb");
    const bottomSpy = vi.spyOn(bottom, "mbb");

    const first = await g.mbb();
    const second = await g.mbb();

    expect(second.min).toEqual(first.min);
    expect(second.max).toEqual(first.max);
    expect(topSpy).toHaveBeenCalledTimes(1);
    expect(bottomSpy).toHaveBeenCalledTimes(1);
  });

  test("concurrent callers share one computation", async () => {
    const g = new Design("board");
    const top = g.topCopper().add(circle(0, 0, 2));
    const spy = vi.spyOn(top, "mbb");

    const [a, b] = await Promise.all([g.mbb(), g.mbb()]);
    expect(a.min).toEqual(b.min);
    expect(a.max).toEqual(b.max);
    expect(spy).toHaveBeenCalledTimes(1);
  });

  test("changing a returned box leaves the cached one alone", async () => {
    const g = new Design("board");
    g.topCopper().add(circle(0, 0, 2));

    const first = await g.mbb();
    first.join(new MBB(point(100, 100), point(200, 200)));

    const second = await g.mbb();
    expect(second).not.toBe(first);
    expect(second.min).toEqual({ x: -1, y: -1 });
    expect(second.max).toEqual({ x: 1, y: 1 });
  });

  test("a design with no primitives has an empty box", async () => {
    const g = new Design("board");
    g.topCopper();
    expect((await g.mbb()).isEmpty()).toBe(true);
  });
});

describe("Design.writeGerber", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "gerber-artwork-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test("writes one file per layer plus the zip bundle", async () => {
    const g = new Design("pad", { outputDir: dir });
    const top = g.topCopper().add(circle(10, 10, 2));
    const drill = g.drill().add(circle(10, 10, 0.25));

    await g.writeGerber();

    expect((await readdir(dir)).sort()).toEqual(["pad.gtl", "pad.xln", "pad.zip"]);
    expect(await readFile(path.join(dir, "pad.gtl"), "utf8")).toBe(top.toGerber());
    expect(await readFile(path.join(dir, "pad.xln"), "utf8")).toBe(drill.toGerber());

    const entries = await readArchive(await readFile(path.join(dir, "pad.zip")));
    expect(entries.map((e) => e.name)).toEqual(["pad.gtl", "pad.xln"]);
    expect(await entries[0].text()).toBe(top.toGerber());
  });

  test("stops at the first failing layer", async () => {
    const g = new Design("pad", { outputDir: dir });
    g.topCopper().add(circle(0, 0, 1));
    g.bottomCopper().add(circle(0, 0, 1));
    // A directory where the first layer file should go makes its write fail.
    await mkdir(path.join(dir, "pad.gtl"));

    await expect(g.writeGerber()).rejects.toThrow();
    expect(existsSync(path.join(dir, "pad.gbl"))).toBe(false);
    expect(existsSync(path.join(dir, "pad.zip"))).toBe(false);
  });

  test("archive() bundles without writing files", async () => {
    const g = new Design("pad", { outputDir: dir });
    g.outline().add(line(0, 0, 10, 0, "circle", 0.1));

    const entries = await readArchive(await g.archive());
    expect(entries.map((e) => e.name)).toEqual(["pad.gko"]);
    expect(await readdir(dir)).toEqual([]);
  });
});
