/**
 * Bring the translation payloads of a content snapshot to a schema version
 */

import {
  ContentSnapshot,
  JsonObject,
  PromotionError,
  PromotionErrorCode,
  TranslationSnapshot
} from '../types/content';
import { SchemaVersion } from '../utils/schemaVersion';
import { cloneSnapshot, flattenPayload, stripSchemaTag } from '../utils/versionedPayload';
import { assertValidPayload } from '../validation/contentSchema';
import { SchemaMigrator } from './MigrationRegistry';

export interface SnapshotMigrationInput {
  snapshot: ContentSnapshot;
  typeSlug: string;
  targetSchema: JsonObject;
  targetVersion: SchemaVersion;
  migrator: SchemaMigrator | null;
  // version a translation was authored against, null when unknown
  sourceVersionOf: (translation: TranslationSnapshot) => SchemaVersion | null;
}

export interface SnapshotMigrationResult {
  snapshot: ContentSnapshot;
  migrated: boolean;
}

/**
 * Migrate and re-tag every translation. Payloads already at the target
 * version are re-tagged only; migrated payloads are validated against the
 * target schema (SCHEMA_INVALID). Nothing is written.
 */
export function migrateSnapshot(input: SnapshotMigrationInput): SnapshotMigrationResult {
  const { typeSlug, targetSchema, targetVersion, migrator } = input;
  const out = cloneSnapshot(input.snapshot);
  let migrated = false;

  out.translations = out.translations.map((translation) => {
    const from = input.sourceVersionOf(translation);
    let payload = stripSchemaTag(translation.content);

    if (!from || SchemaVersion.compare(from, targetVersion) !== 0) {
      if (!from) {
        throw new PromotionError(
          PromotionErrorCode.SCHEMA_MIGRATION_REQUIRED,
          `schema migration required: ${translation.locale} payload has no schema version`,
          { locale: translation.locale, target: targetVersion.toString() }
        );
      }
      if (!migrator) {
        throw new PromotionError(
          PromotionErrorCode.SCHEMA_MIGRATION_REQUIRED,
          `schema migration required: ${from.toString()} -> ${targetVersion.toString()}`,
          { locale: translation.locale, from: from.toString(), target: targetVersion.toString() }
        );
      }
      payload = stripSchemaTag(
        migrator.migrate(typeSlug, from.withSlug(typeSlug).toString(), targetVersion.withSlug(typeSlug).toString(), payload)
      );
      assertValidPayload(targetSchema, payload, { locale: translation.locale, schema_version: targetVersion.toString() });
      migrated = true;
    }

    return {
      ...translation,
      content: flattenPayload({ schemaVersion: targetVersion, payload })
    };
  });

  return { snapshot: out, migrated };
}
