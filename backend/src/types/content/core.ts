/**
 * Core Content Type Definitions
 *
 * Records are environment scoped: the same logical content type or entry may
 * exist independently in several environments, linked only by slug.
 */

import { JsonObject } from './json';
import {
  ContentEntryStatus,
  ContentTypeStatus,
  VersionStatus
} from './enums';

// ============================================
// Environments and locales
// ============================================

export interface Environment {
  id: string;
  key: string;
  name: string;
  description?: string | null;
  is_active: boolean;
  is_default: boolean;
  created_at?: Date;
  updated_at?: Date;
}

export interface Locale {
  id: string;
  code: string;
  display_name: string;
  is_active: boolean;
}

// ============================================
// Content types
// ============================================

/**
 * Past schema of a content type, kept in its schema history
 */
export interface SchemaSnapshot {
  version: string;
  schema: JsonObject;
  ui_schema?: JsonObject | null;
  capabilities?: JsonObject | null;
  status: ContentTypeStatus;
  updated_at: Date;
  updated_by?: string | null;
}

export interface ContentType {
  id: string;
  slug: string;
  name: string;
  description?: string | null;
  schema: JsonObject;
  ui_schema?: JsonObject | null;
  capabilities?: JsonObject | null;
  icon?: string | null;
  schema_version: string;
  schema_history: SchemaSnapshot[];
  status: ContentTypeStatus;
  environment_id: string;
  created_at: Date;
  updated_at: Date;
}

// ============================================
// Content entries and versions
// ============================================

export interface ContentTranslation {
  id: string;
  content_id: string;
  locale_id: string;
  locale?: string;
  translation_group_id?: string | null;
  title: string;
  summary?: string | null;
  content: JsonObject;
  created_at: Date;
  updated_at: Date;
}

export interface ContentEntry {
  id: string;
  content_type_id: string;
  slug: string;
  current_version: number;
  published_version?: number | null;
  status: ContentEntryStatus;
  environment_id: string;
  metadata?: JsonObject | null;
  created_by: string;
  updated_by: string;
  published_at?: Date | null;
  published_by?: string | null;
  created_at: Date;
  updated_at: Date;
  translations?: ContentTranslation[];
}

/**
 * Translation payload captured by a version. `content` carries the
 * schema-version tag under the reserved `_schema` key.
 */
export interface TranslationSnapshot {
  locale: string;
  title: string;
  summary?: string | null;
  content: JsonObject;
}

export interface ContentSnapshot {
  translations: TranslationSnapshot[];
  fields?: JsonObject | null;
  metadata?: JsonObject | null;
}

export interface ContentVersion {
  id: string;
  content_id: string;
  version: number;
  status: VersionStatus;
  snapshot: ContentSnapshot;
  created_by: string;
  created_at: Date;
  published_at?: Date | null;
  published_by?: string | null;
}

// ============================================
// Block definitions
// ============================================

export interface BlockDefinition {
  id: string;
  slug: string;
  name: string;
  description?: string | null;
  icon?: string | null;
  category?: string | null;
  status: string;
  schema: JsonObject;
  schema_version?: string | null;
  ui_schema?: JsonObject | null;
  defaults?: JsonObject | null;
  environment_id: string;
}

export interface RegisterBlockDefinitionInput {
  slug: string;
  name: string;
  description?: string | null;
  icon?: string | null;
  category?: string | null;
  status: string;
  schema: JsonObject;
  ui_schema?: JsonObject | null;
  defaults?: JsonObject | null;
  environment_key: string;
}

export interface UpdateBlockDefinitionInput {
  id: string;
  slug?: string;
  name?: string;
  description?: string | null;
  icon?: string | null;
  category?: string | null;
  status?: string;
  schema?: JsonObject;
  ui_schema?: JsonObject | null;
  defaults?: JsonObject | null;
}

// ============================================
// Activity
// ============================================

export interface ActivityEvent {
  verb: string;
  object_type: string;
  object_id: string;
  metadata: JsonObject;
  occurred_at?: Date;
}
