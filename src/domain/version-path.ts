/**
 * Navigation position across an ancestry chain.
 *
 * A VersionPath holds one version per ancestry level, root first. The last
 * element is the version shown for the current (leaf) execution; the
 * elements before it remember where each ancestor was when the user stepped
 * into the child. Paths are immutable: every operation returns a new path.
 *
 * The string form (`"4_0_12"`) is what travels in URLs.
 */

export const VERSION_PATH_SEPARATOR = '_';

export class VersionPath {
  private readonly versions: readonly number[];

  constructor(versions: readonly number[]) {
    if (versions.length === 0) {
      throw new RangeError('VersionPath must contain at least one version');
    }
    for (const version of versions) {
      if (!Number.isInteger(version) || version < 0) {
        throw new RangeError(`Invalid version in VersionPath: ${version}`);
      }
    }
    this.versions = [...versions];
  }

  /** `[0]`: the start of a root execution. */
  static default(): VersionPath {
    return new VersionPath([0]);
  }

  static of(...versions: number[]): VersionPath {
    return new VersionPath(versions);
  }

  /** Parse the URL form; returns `undefined` on malformed input. */
  static parse(input: string): VersionPath | undefined {
    const versions: number[] = [];
    for (const part of input.split(VERSION_PATH_SEPARATOR)) {
      if (!/^\d+$/.test(part)) return undefined;
      versions.push(Number(part));
    }
    return new VersionPath(versions);
  }

  get length(): number {
    return this.versions.length;
  }

  toArray(): number[] {
    return [...this.versions];
  }

  last(): number {
    return this.versions[this.versions.length - 1];
  }

  /** Replace the last version. */
  change(version: number): VersionPath {
    return new VersionPath([...this.versions.slice(0, -1), version]);
  }

  /** Descend into a child execution, starting at its version 0. */
  stepInto(): VersionPath {
    return new VersionPath([...this.versions, 0]);
  }

  /** Ascend to the parent; `undefined` when already at the root level. */
  stepOut(): VersionPath | undefined {
    if (this.versions.length === 1) return undefined;
    return new VersionPath(this.versions.slice(0, -1));
  }

  equals(other: VersionPath): boolean {
    return (
      this.versions.length === other.versions.length &&
      this.versions.every((v, i) => v === other.versions[i])
    );
  }

  toString(): string {
    return this.versions.join(VERSION_PATH_SEPARATOR);
  }
}
