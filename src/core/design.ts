// src/core/design.ts

import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

import { MBB } from "../types/pcb-model";
import type { DesignOptions } from "../types/options";
import { GerberArchive } from "../io/archive";
import { layerFilename, type LayerRole } from "../io/layer-files";
import { Layer } from "./layer";

/**
 * The set of layers making up one board. Every layer is written to
 * `<prefix>.<ext>` and bundled into `<prefix>.zip`.
 */
export class Design {
  readonly layers: Layer[] = [];
  private readonly outputDir: string;
  private mbbPromise: Promise<MBB> | null = null;

  constructor(
    readonly filenamePrefix: string,
    options: DesignOptions = {}
  ) {
    this.outputDir = options.outputDir ?? process.cwd();
  }

  topCopper(): Layer {
    return this.addLayer("top_copper");
  }

  topSolderMask(): Layer {
    return this.addLayer("top_mask");
  }

  topSilkscreen(): Layer {
    return this.addLayer("top_silk");
  }

  bottomCopper(): Layer {
    return this.addLayer("bottom_copper");
  }

  bottomSolderMask(): Layer {
    return this.addLayer("bottom_mask");
  }

  bottomSilkscreen(): Layer {
    return this.addLayer("bottom_silk");
  }

  /** Inner copper layer n (n >= 2), written as ".g<n>l". */
  layerN(n: number): Layer {
    return this.addLayer("inner_copper", n);
  }

  drill(): Layer {
    return this.addLayer("drill");
  }

  outline(): Layer {
    return this.addLayer("outline");
  }

  private addLayer(role: LayerRole, innerIndex?: number): Layer {
    const layer = new Layer(layerFilename(this.filenamePrefix, role, innerIndex), role);
    this.layers.push(layer);
    return layer;
  }

  /**
   * Write each layer file and the bundled zip into the output directory.
   *
   * Layers are written one at a time; the first failure rejects with the
   * underlying error and nothing further is written. Files already
   * written stay on disk.
   */
  async writeGerber(): Promise<void> {
    await mkdir(this.outputDir, { recursive: true });

    const archive = new GerberArchive();
    for (const layer of this.layers) {
      const content = layer.toGerber();
      await writeFile(path.join(this.outputDir, layer.filename), content);
      archive.add(layer.filename, content);
    }

    const zipPath = path.join(this.outputDir, `${this.filenamePrefix}.zip`);
    await writeFile(zipPath, await archive.toBuffer());
  }

  /** The zip bundle alone, without touching the filesystem. */
  async archive(): Promise<Buffer> {
    const archive = new GerberArchive();
    for (const layer of this.layers) {
      archive.add(layer.filename, layer.toGerber());
    }
    return archive.toBuffer();
  }

  /**
   * Bounding box of the whole design, computed once.
   *
   * The first call starts one task per layer and resolves when all have
   * merged into the shared box. Later or concurrent calls wait on the same
   * computation. Each caller receives its own copy of the cached box.
   */
  mbb(): Promise<MBB> {
    if (!this.mbbPromise) {
      this.mbbPromise = this.computeMBB();
    }
    return this.mbbPromise.then((m) => m.clone());
  }

  private async computeMBB(): Promise<MBB> {
    const total = MBB.empty();
    await Promise.all(
      this.layers.map(async (layer) => {
        const layerMBB = await Promise.resolve().then(() => layer.mbb());
        // Merges run on the event loop one at a time.
        total.join(layerMBB);
      })
    );
    return total;
  }
}
