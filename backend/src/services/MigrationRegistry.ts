/**
 * MigrationRegistry - payload transforms between content type schema versions
 *
 * One transform per (type slug, from version, to version). `migrate` only
 * follows a direct edge: versions that a deployment expects to skip need their
 * own registered edge. Multi-hop traversal is available through the explicit
 * `findPath` / `migrateAlongPath` pair and is never applied implicitly.
 */

import {
  JsonObject,
  MigrationError,
  PromotionErrorCode,
  cloneJson,
  errorMessage,
  isJsonObject,
  isJsonValue
} from '../types/content';
import { SchemaVersion } from '../utils/schemaVersion';
import { stripSchemaTag } from '../utils/versionedPayload';

/**
 * Pure transform. Receives and returns a payload without the version tag.
 */
export type MigrationTransform = (payload: JsonObject) => JsonObject;

export interface MigrationEntry {
  typeSlug: string;
  fromVersion: string;
  toVersion: string;
  transform: MigrationTransform;
}

/**
 * Read side used by services that only apply migrations
 */
export interface SchemaMigrator {
  migrate(typeSlug: string, fromVersion: string, toVersion: string, payload: JsonObject): JsonObject;
}

interface NormalizedKey {
  typeSlug: string;
  from: SchemaVersion;
  to: SchemaVersion;
}

export class MigrationRegistry implements SchemaMigrator {
  // typeSlug -> fromVersion -> toVersion -> entry
  private edges: Map<string, Map<string, Map<string, MigrationEntry>>> = new Map();
  private pathCache: Map<string, string[] | null> = new Map();

  /**
   * Register a transform. Throws DUPLICATE_MIGRATION when the key exists.
   */
  register(typeSlug: string, fromVersion: string, toVersion: string, transform: MigrationTransform): void {
    if (typeof transform !== 'function') {
      throw new MigrationError(PromotionErrorCode.INVALID_FORMAT, 'migration transform must be a function', { typeSlug });
    }
    const key = this.normalizeKey(typeSlug, fromVersion, toVersion);
    const from = key.from.toString();
    const to = key.to.toString();

    let byFrom = this.edges.get(key.typeSlug);
    if (!byFrom) {
      byFrom = new Map();
      this.edges.set(key.typeSlug, byFrom);
    }
    let byTo = byFrom.get(from);
    if (!byTo) {
      byTo = new Map();
      byFrom.set(from, byTo);
    }
    if (byTo.has(to)) {
      throw new MigrationError(
        PromotionErrorCode.DUPLICATE_MIGRATION,
        `migration already registered: ${key.typeSlug} ${from} -> ${to}`,
        { typeSlug: key.typeSlug, fromVersion: from, toVersion: to }
      );
    }

    byTo.set(to, Object.freeze({ typeSlug: key.typeSlug, fromVersion: from, toVersion: to, transform }));
    this.pathCache.clear();
  }

  has(typeSlug: string, fromVersion: string, toVersion: string): boolean {
    const key = this.normalizeKey(typeSlug, fromVersion, toVersion);
    return this.lookup(key.typeSlug, key.from.toString(), key.to.toString()) !== undefined;
  }

  /**
   * Registered edges, optionally for one type, ordered by from/to version
   */
  list(typeSlug?: string): MigrationEntry[] {
    const slugs = typeSlug !== undefined ? [typeSlug.trim()] : [...this.edges.keys()].sort();
    const out: MigrationEntry[] = [];
    for (const slug of slugs) {
      const byFrom = this.edges.get(slug);
      if (!byFrom) continue;
      for (const byTo of byFrom.values()) {
        out.push(...byTo.values());
      }
    }
    return out.sort((a, b) =>
      a.typeSlug.localeCompare(b.typeSlug) ||
      SchemaVersion.compare(SchemaVersion.parse(a.fromVersion), SchemaVersion.parse(b.fromVersion)) ||
      SchemaVersion.compare(SchemaVersion.parse(a.toVersion), SchemaVersion.parse(b.toVersion))
    );
  }

  /**
   * Bring a payload from one schema version to another over a direct edge.
   * Equal versions return the payload unchanged.
   */
  migrate(typeSlug: string, fromVersion: string, toVersion: string, payload: JsonObject): JsonObject {
    const key = this.normalizeKey(typeSlug, fromVersion, toVersion);
    if (key.from.equals(key.to)) {
      return payload;
    }

    const entry = this.lookup(key.typeSlug, key.from.toString(), key.to.toString());
    if (!entry) {
      throw new MigrationError(
        PromotionErrorCode.NO_MIGRATION_PATH,
        `no migration registered for ${key.typeSlug} ${key.from.toString()} -> ${key.to.toString()}`,
        { typeSlug: key.typeSlug, fromVersion: key.from.toString(), toVersion: key.to.toString() }
      );
    }

    return this.apply(entry, payload);
  }

  /**
   * Shortest chain of registered edges between two versions, or null.
   * Neighbours are visited in ascending version order so the result is
   * deterministic. Results are cached until the next registration.
   */
  findPath(typeSlug: string, fromVersion: string, toVersion: string): string[] | null {
    const key = this.normalizeKey(typeSlug, fromVersion, toVersion);
    const from = key.from.toString();
    const to = key.to.toString();
    const cacheKey = `${key.typeSlug}|${from}|${to}`;

    const cached = this.pathCache.get(cacheKey);
    if (cached !== undefined) {
      return cached ? [...cached] : null;
    }

    const path = this.searchPath(key.typeSlug, from, to);
    this.pathCache.set(cacheKey, path);
    return path ? [...path] : null;
  }

  /**
   * Apply every edge of `findPath` in order
   */
  migrateAlongPath(typeSlug: string, fromVersion: string, toVersion: string, payload: JsonObject): JsonObject {
    const key = this.normalizeKey(typeSlug, fromVersion, toVersion);
    const path = this.findPath(key.typeSlug, fromVersion, toVersion);
    if (!path) {
      throw new MigrationError(
        PromotionErrorCode.NO_MIGRATION_PATH,
        `no migration path for ${key.typeSlug} ${key.from.toString()} -> ${key.to.toString()}`,
        { typeSlug: key.typeSlug, fromVersion: key.from.toString(), toVersion: key.to.toString() }
      );
    }

    let current = payload;
    for (let index = 1; index < path.length; index++) {
      const entry = this.lookup(key.typeSlug, path[index - 1], path[index]);
      if (!entry) {
        throw new MigrationError(PromotionErrorCode.NO_MIGRATION_PATH, `migration edge disappeared: ${path[index - 1]} -> ${path[index]}`);
      }
      current = this.apply(entry, current);
    }
    return current;
  }

  private searchPath(typeSlug: string, from: string, to: string): string[] | null {
    if (from === to) return [from];

    const byFrom = this.edges.get(typeSlug);
    if (!byFrom) return null;

    const previous = new Map<string, string>();
    const visited = new Set<string>([from]);
    const queue: string[] = [from];

    while (queue.length > 0) {
      const current = queue.shift();
      if (current === undefined) break;

      const neighbours = [...(byFrom.get(current)?.keys() ?? [])].sort((a, b) =>
        SchemaVersion.compare(SchemaVersion.parse(a), SchemaVersion.parse(b))
      );
      for (const next of neighbours) {
        if (visited.has(next)) continue;
        visited.add(next);
        previous.set(next, current);
        if (next === to) {
          const path = [to];
          let step = previous.get(to);
          while (step !== undefined) {
            path.unshift(step);
            step = previous.get(step);
          }
          return path;
        }
        queue.push(next);
      }
    }
    return null;
  }

  private apply(entry: MigrationEntry, payload: JsonObject): JsonObject {
    let result: unknown;
    try {
      result = entry.transform(cloneJson(stripSchemaTag(payload)));
    } catch (error) {
      throw new MigrationError(
        PromotionErrorCode.MIGRATION_FAILED,
        `migration ${entry.typeSlug} ${entry.fromVersion} -> ${entry.toVersion} failed: ${errorMessage(error)}`,
        { typeSlug: entry.typeSlug, fromVersion: entry.fromVersion, toVersion: entry.toVersion },
        { cause: error }
      );
    }

    if (!isJsonValue(result) || !isJsonObject(result)) {
      throw new MigrationError(
        PromotionErrorCode.MIGRATION_FAILED,
        `migration ${entry.typeSlug} ${entry.fromVersion} -> ${entry.toVersion} returned a non-object payload`,
        { typeSlug: entry.typeSlug, fromVersion: entry.fromVersion, toVersion: entry.toVersion }
      );
    }

    return stripSchemaTag(result);
  }

  private lookup(typeSlug: string, from: string, to: string): MigrationEntry | undefined {
    return this.edges.get(typeSlug)?.get(from)?.get(to);
  }

  private normalizeKey(typeSlug: string, fromVersion: string, toVersion: string): NormalizedKey {
    let from: SchemaVersion;
    let to: SchemaVersion;
    try {
      from = SchemaVersion.parse(fromVersion);
      to = SchemaVersion.parse(toVersion);
    } catch (error) {
      throw new MigrationError(PromotionErrorCode.INVALID_FORMAT, errorMessage(error), { fromVersion, toVersion });
    }

    const slug = (typeSlug ?? '').trim() || from.slug || to.slug;
    if (slug === '') {
      throw new MigrationError(PromotionErrorCode.INVALID_FORMAT, 'migration type slug required', { fromVersion, toVersion });
    }
    if ((from.slug !== '' && from.slug !== slug) || (to.slug !== '' && to.slug !== slug)) {
      throw new MigrationError(PromotionErrorCode.INVALID_FORMAT, `migration versions must belong to ${slug}`, {
        typeSlug: slug,
        fromVersion,
        toVersion
      });
    }

    return { typeSlug: slug, from: from.withSlug(slug), to: to.withSlug(slug) };
  }
}
