// src/io/archive.ts
import JSZip from "jszip";

/**
 * A single entry inside a layer bundle zip.
 */
export interface ZipEntry {
  /** Normalized path style name, always forward slashes */
  name: string;
  /** Read entry as UTF-8 text */
  text: () => Promise<string>;
}

/**
 * Zip bundle of Gerber layer files, ready for submission to a fabricator.
 */
export class GerberArchive {
  private readonly zip = new JSZip();

  add(name: string, content: string): void {
    const normalized = normalizeZipPath(name);
    if (!normalized) {
      throw new Error(`Invalid archive entry name "${name}"`);
    }
    this.zip.file(normalized, content);
  }

  toBuffer(): Promise<Buffer> {
    return this.zip.generateAsync({
      type: "nodebuffer",
      compression: "DEFLATE",
    });
  }
}

/**
 * Read back a zip produced by GerberArchive (or any fabricator bundle).
 */
export async function readArchive(input: Uint8Array | ArrayBuffer): Promise<ZipEntry[]> {
  const zip = await JSZip.loadAsync(input);

  const entries: ZipEntry[] = [];

  zip.forEach((rawName, file) => {
    if (file.dir) {
      // Ignore directories
      return;
    }

    entries.push({
      name: normalizeZipPath(rawName),
      text: () => file.async("text"),
    });
  });

  return entries;
}

/**
 * Normalize zip entry paths:
 * - Replace backslashes with forward slashes
 * - Remove leading "./" and "/"
 */
function normalizeZipPath(path: string): string {
  let p = path.replace(/\\/g, "/");
  if (p.startsWith("./")) {
    p = p.slice(2);
  }
  if (p.startsWith("/")) {
    p = p.slice(1);
  }
  return p;
}
