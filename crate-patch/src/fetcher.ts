/**
 * Locates pristine crate sources.
 */

import fs from "node:fs/promises";
import path from "node:path";

export interface CrateFetcher {
  /** Absolute path of an unmodified source tree for the crate */
  fetch(name: string, version: string): Promise<string>;
}

export class FetchError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FetchError";
  }
}

/**
 * Reads the sources cargo has already unpacked under
 * <cargoHome>/registry/src/<index>/<name>-<version>.
 */
export class CargoRegistryFetcher implements CrateFetcher {
  constructor(private readonly cargoHome: string) {}

  get registrySrc(): string {
    return path.join(this.cargoHome, "registry", "src");
  }

  async fetch(name: string, version: string): Promise<string> {
    let indexes: string[];
    try {
      indexes = (await fs.readdir(this.registrySrc)).sort();
    } catch {
      throw new FetchError(`No cargo registry sources at ${this.registrySrc}; run \`cargo fetch\` first`);
    }

    for (const index of indexes) {
      const candidate = path.join(this.registrySrc, index, `${name}-${version}`);
      try {
        if ((await fs.stat(candidate)).isDirectory()) return candidate;
      } catch {
        continue;
      }
    }
    throw new FetchError(`${name}@${version} not found under ${this.registrySrc}; run \`cargo fetch\` first`);
  }
}
