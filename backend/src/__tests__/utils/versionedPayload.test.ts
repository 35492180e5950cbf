import { describe, it, expect } from '@jest/globals';
import { ContentSnapshot } from '../../types/content';
import { SchemaVersion } from '../../utils/schemaVersion';
import {
  applySnapshotSchemaVersion,
  flattenPayload,
  snapshotSchemaVersion,
  stripSchemaTag,
  unflattenPayload
} from '../../utils/versionedPayload';
import { tagged, translation } from '../helpers/fixtures';

describe('versioned payloads', () => {
  it('should split a stored payload into tag and content', () => {
    const { schemaVersion, payload } = unflattenPayload(tagged('article@v1.0.0', { title: 'Hello' }));
    expect(schemaVersion?.toString()).toBe('article@v1.0.0');
    expect(payload).toEqual({ title: 'Hello' });
  });

  it('should read an unparsable tag as absent', () => {
    const { schemaVersion, payload } = unflattenPayload({ title: 'Hello', _schema: 'not-a-version' });
    expect(schemaVersion).toBeNull();
    expect(payload).toEqual({ title: 'Hello' });
  });

  it('should overwrite any tag inside the payload when flattening', () => {
    const stored = flattenPayload({
      schemaVersion: SchemaVersion.parse('article@v2.0.0'),
      payload: { headline: 'Hello', _schema: 'junk' }
    });
    expect(stored).toEqual({ headline: 'Hello', _schema: 'article@v2.0.0' });
  });

  it('should leave the tag out when there is no version', () => {
    expect(flattenPayload({ schemaVersion: null, payload: { headline: 'Hello' } })).toEqual({ headline: 'Hello' });
  });

  it('should not mutate the payload it strips', () => {
    const stored = tagged('article@v1.0.0', { title: 'Hello', tags: ['a'] });
    const stripped = stripSchemaTag(stored);
    expect(stripped).toEqual({ title: 'Hello', tags: ['a'] });
    expect(stored._schema).toBe('article@v1.0.0');
  });

  describe('snapshotSchemaVersion', () => {
    it('should use the first tagged translation', () => {
      const snapshot: ContentSnapshot = {
        translations: [translation('en', { title: 'Hello' }), translation('fr', tagged('article@v1.1.0', { title: 'Bonjour' }))]
      };
      expect(snapshotSchemaVersion(snapshot)?.toString()).toBe('article@v1.1.0');
    });

    it('should fall back to the fields document', () => {
      const snapshot: ContentSnapshot = {
        translations: [translation('en', { title: 'Hello' })],
        fields: tagged('article@v1.0.0', {})
      };
      expect(snapshotSchemaVersion(snapshot)?.toString()).toBe('article@v1.0.0');
      expect(snapshotSchemaVersion({ translations: [] })).toBeNull();
    });
  });

  it('should retag every translation of a copy', () => {
    const snapshot: ContentSnapshot = {
      translations: [translation('en', tagged('article@v1.0.0', { title: 'Hello' })), translation('fr', { title: 'Bonjour' })]
    };
    const retagged = applySnapshotSchemaVersion(snapshot, SchemaVersion.parse('article@v2.0.0'));

    expect(retagged.translations.map((tr) => tr.content)).toEqual([
      { title: 'Hello', _schema: 'article@v2.0.0' },
      { title: 'Bonjour', _schema: 'article@v2.0.0' }
    ]);
    expect(snapshot.translations[0].content._schema).toBe('article@v1.0.0');
    expect(snapshot.translations[1].content._schema).toBeUndefined();
  });
});
