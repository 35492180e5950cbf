/**
 * Request and response contracts for the promotion services
 */

import { JsonObject } from './json';
import { ContentSnapshot } from './core';
import {
  PromotionErrorCode,
  PromotionKind,
  PromotionMode,
  PromotionScope,
  PromotionStatus
} from './enums';

/**
 * Standard service response wrapper
 */
export interface ServiceResponse<T> {
  success: boolean;
  data?: T;
  error?: string;
  errorCode?: PromotionErrorCode;
  metadata?: Record<string, unknown>;
}

// ============================================
// Promotion options
// ============================================

/**
 * Flags shared by every promotion request. Each flag toggles independently.
 */
export interface PromoteOptions {
  dry_run?: boolean;
  force?: boolean;
  allow_breaking_changes?: boolean;
  allow_draft?: boolean;
  promote_as_active?: boolean;
  promote_as_published?: boolean;
  prefer_published?: boolean;
  migrate_on_promote?: boolean;
  include_versions?: boolean;
  auto_promote_type?: boolean;
  mode?: PromotionMode | 'merge';
}

/**
 * Options after defaults are applied
 */
export interface ResolvedPromoteOptions {
  dry_run: boolean;
  force: boolean;
  allow_breaking_changes: boolean;
  allow_draft: boolean;
  promote_as_active: boolean;
  promote_as_published: boolean;
  prefer_published: boolean;
  migrate_on_promote: boolean;
  include_versions: boolean;
  auto_promote_type: boolean;
  mode: PromotionMode;
}

/**
 * Per-call execution context. Not part of the serialized request.
 */
export interface PromotionContext {
  signal?: AbortSignal;
  actor_id?: string;
}

export interface PromoteContentTypeRequest {
  content_type_id: string;
  target_environment?: string;
  target_environment_id?: string;
  options?: PromoteOptions;
}

export interface PromoteContentEntryRequest {
  content_id: string;
  target_environment?: string;
  target_environment_id?: string;
  options?: PromoteOptions;
}

export interface PromoteEnvironmentRequest {
  source_environment: string;
  target_environment: string;
  scope?: PromotionScope;
  content_type_ids?: string[];
  content_type_slugs?: string[];
  content_ids?: string[];
  content_slugs?: string[];
  content_entry_type_id?: string;
  content_entry_type_slug?: string;
  options?: PromoteOptions;
}

// ============================================
// Promotion results
// ============================================

export interface EnvironmentRef {
  id: string;
  key: string;
}

export interface PromoteItem {
  kind: PromotionKind;
  source_id: string;
  target_id: string;
  status: PromotionStatus;
  message?: string;
  details: JsonObject;
}

export interface PromoteError {
  kind: PromotionKind;
  source_id: string;
  error: string;
  error_code: PromotionErrorCode;
}

export interface PromoteSummaryCounts {
  created: number;
  updated: number;
  skipped: number;
  failed: number;
}

export interface PromoteSummary {
  content_types: PromoteSummaryCounts;
  content_entries: PromoteSummaryCounts;
}

export interface PromoteEnvironmentResult {
  source_env: EnvironmentRef;
  target_env: EnvironmentRef;
  summary: PromoteSummary;
  items: PromoteItem[];
  errors: PromoteError[];
}

// ============================================
// Content version store
// ============================================

export interface CreateDraftInput {
  content_id: string;
  snapshot: ContentSnapshot;
  created_by: string;
  base_version?: number;
}

export interface PublishDraftInput {
  content_id: string;
  version: number;
  published_by: string;
}

export interface RestoreVersionInput {
  content_id: string;
  version: number;
  restored_by: string;
}

// ============================================
// Environments
// ============================================

export interface CreateEnvironmentInput {
  key?: string;
  name?: string;
  description?: string | null;
  is_active?: boolean;
  is_default?: boolean;
}

export interface UpdateEnvironmentInput {
  id: string;
  name?: string;
  description?: string | null;
  is_active?: boolean;
  is_default?: boolean;
}
