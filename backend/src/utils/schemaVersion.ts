import { ChangeLevel, SchemaVersionError } from '../types/content';

const SEMVER_PATTERN = /^v?(\d+)\.(\d+)\.(\d+)$/;

export type VersionComparison = -1 | 0 | 1;

/**
 * Semantic version of a content type or block schema, e.g. `article@v2.0.0`
 */
export class SchemaVersion {
  readonly slug: string;
  readonly major: number;
  readonly minor: number;
  readonly patch: number;

  private constructor(slug: string, major: number, minor: number, patch: number) {
    this.slug = slug;
    this.major = major;
    this.minor = minor;
    this.patch = patch;
    Object.freeze(this);
  }

  static of(slug: string, major: number, minor: number, patch: number): SchemaVersion {
    for (const part of [major, minor, patch]) {
      if (!Number.isSafeInteger(part) || part < 0) {
        throw new SchemaVersionError(`schema version part must be a non-negative integer: ${part}`);
      }
    }
    return new SchemaVersion(slug.trim(), major, minor, patch);
  }

  /**
   * Initial version assigned to an untagged schema
   */
  static initial(slug: string): SchemaVersion {
    return SchemaVersion.of(slug, 1, 0, 0);
  }

  /**
   * Parse `slug@vMAJOR.MINOR.PATCH` or `vMAJOR.MINOR.PATCH`. The `v` is optional.
   */
  static parse(value: string): SchemaVersion {
    const trimmed = (value ?? '').trim();
    if (trimmed === '') {
      throw new SchemaVersionError('invalid schema version: empty');
    }

    const parts = trimmed.split('@');
    if (parts.length > 2) {
      throw new SchemaVersionError(`invalid schema version: ${value}`, { value });
    }

    const slug = parts.length === 2 ? parts[0].trim() : '';
    const semver = (parts.length === 2 ? parts[1] : parts[0]).trim();
    if (parts.length === 2 && (slug === '' || semver === '')) {
      throw new SchemaVersionError(`invalid schema version: ${value}`, { value });
    }

    const match = SEMVER_PATTERN.exec(semver);
    if (!match) {
      throw new SchemaVersionError(`invalid schema version: ${value}`, { value });
    }

    const [major, minor, patch] = [match[1], match[2], match[3]].map(Number);
    if (![major, minor, patch].every(Number.isSafeInteger)) {
      throw new SchemaVersionError(`schema version part out of range: ${value}`, { value });
    }

    return new SchemaVersion(slug, major, minor, patch);
  }

  /**
   * Parse, returning null instead of throwing
   */
  static tryParse(value: string | null | undefined): SchemaVersion | null {
    if (value === null || value === undefined) return null;
    try {
      return SchemaVersion.parse(value);
    } catch {
      return null;
    }
  }

  /**
   * Total order on major, minor, patch. The slug is not compared.
   */
  static compare(a: SchemaVersion, b: SchemaVersion): VersionComparison {
    if (a.major !== b.major) return a.major < b.major ? -1 : 1;
    if (a.minor !== b.minor) return a.minor < b.minor ? -1 : 1;
    if (a.patch !== b.patch) return a.patch < b.patch ? -1 : 1;
    return 0;
  }

  get semver(): string {
    return `v${this.major}.${this.minor}.${this.patch}`;
  }

  withSlug(slug: string): SchemaVersion {
    return new SchemaVersion(slug.trim(), this.major, this.minor, this.patch);
  }

  equals(other: SchemaVersion): boolean {
    return this.slug === other.slug && SchemaVersion.compare(this, other) === 0;
  }

  toString(): string {
    return this.slug === '' ? this.semver : `${this.slug}@${this.semver}`;
  }

  toJSON(): string {
    return this.toString();
  }
}

/**
 * Increment a version by a change level
 */
export function bumpVersion(base: SchemaVersion, level: ChangeLevel): SchemaVersion {
  switch (level) {
    case ChangeLevel.MAJOR:
      return SchemaVersion.of(base.slug, base.major + 1, 0, 0);
    case ChangeLevel.MINOR:
      return SchemaVersion.of(base.slug, base.major, base.minor + 1, 0);
    case ChangeLevel.PATCH:
      return SchemaVersion.of(base.slug, base.major, base.minor, base.patch + 1);
    default:
      return base;
  }
}

function lexical(a: string, b: string): VersionComparison {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Compare two stored version strings.
 *
 * Empty sorts first. When either side does not parse, the strings are
 * compared lexically, so `article@v10.0.0` vs `garbage` is decided by
 * character order rather than rejected.
 */
export function compareVersionStrings(a: string | null | undefined, b: string | null | undefined): VersionComparison {
  const left = (a ?? '').trim();
  const right = (b ?? '').trim();
  if (left === right) return 0;
  if (left === '') return -1;
  if (right === '') return 1;

  const parsedLeft = SchemaVersion.tryParse(left);
  const parsedRight = SchemaVersion.tryParse(right);
  if (!parsedLeft || !parsedRight) {
    return lexical(left, right);
  }
  return SchemaVersion.compare(parsedLeft, parsedRight);
}

/**
 * Canonical string for a version, or the trimmed input when it does not parse
 */
export function normalizeVersionString(value: string): string {
  const parsed = SchemaVersion.tryParse(value);
  return parsed ? parsed.toString() : value.trim();
}
