import { Pool } from 'pg';
import { Locale, RepositoryNotFoundError } from '../types/content';
import { LocaleRepository } from '../repositories/interfaces';
import { query } from '../utils/database';

interface LocaleRow {
  id: string;
  code: string;
  display_name: string;
  is_active: boolean;
}

export class PgLocaleRepository implements LocaleRepository {
  constructor(private pool: Pool) {}

  async getByCode(code: string, signal?: AbortSignal): Promise<Locale> {
    const result = await query<LocaleRow>(
      this.pool,
      'SELECT id, code, display_name, is_active FROM locales WHERE lower(code) = lower($1) AND is_active = TRUE',
      [code.trim()],
      signal
    );
    if (result.rows.length === 0) throw new RepositoryNotFoundError('locale', code);
    return { ...result.rows[0] };
  }
}
