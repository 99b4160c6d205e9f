/**
 * Conversion Manifest
 * Ordered record of every file copied during a merge pass
 *
 * Persisted as plain text, one line per copy in copy order:
 *   '/night-1/process/pp_light_0001.fit' -> '/merged/pp_light_00001.fit'
 */

import { writeFile } from "fs/promises";
import path from "node:path";

export const MANIFEST_FILENAME = "conversion.txt";

const LINE_PATTERN = /^'(.*)' -> '(.*)'$/;

export class ConversionManifest {
  // Map keeps insertion order, which is the copy order
  private mapping = new Map<string, string>();

  /**
   * Parse manifest text back into a manifest
   * Throws on the first line that is not an entry
   */
  static parse(text: string): ConversionManifest {
    const manifest = new ConversionManifest();
    const lines = text.split("\n");

    lines.forEach((line, i) => {
      if (line === "" && i === lines.length - 1) return;

      const match = LINE_PATTERN.exec(line);
      if (!match) {
        throw new Error(`Invalid manifest entry on line ${i + 1}: ${line}`);
      }
      manifest.add(match[1], match[2]);
    });

    return manifest;
  }

  add(original: string, output: string): void {
    this.mapping.set(original, output);
  }

  has(original: string): boolean {
    return this.mapping.has(original);
  }

  get(original: string): string | undefined {
    return this.mapping.get(original);
  }

  get size(): number {
    return this.mapping.size;
  }

  entries(): Array<[original: string, output: string]> {
    return [...this.mapping.entries()];
  }

  serialize(): string {
    let text = "";
    for (const [original, output] of this.mapping) {
      text += `'${original}' -> '${output}'\n`;
    }
    return text;
  }

  /**
   * Write the manifest to conversion.txt in the given directory
   * Replaces any manifest from a previous run
   *
   * @returns Path of the written file
   */
  async save(directory: string): Promise<string> {
    const filepath = path.join(directory, MANIFEST_FILENAME);
    await writeFile(filepath, this.serialize(), "utf-8");
    return filepath;
  }
}
