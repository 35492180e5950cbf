import { Locale, RepositoryNotFoundError } from '../../types/content';
import { LocaleRepository } from '../interfaces';
import { copy, tick } from './store';

export class MemoryLocaleRepository implements LocaleRepository {
  private locales: Map<string, Locale> = new Map();

  constructor(locales: Locale[] = []) {
    locales.forEach((locale) => this.add(locale));
  }

  add(locale: Locale): void {
    this.locales.set(locale.code.trim().toLowerCase(), copy(locale));
  }

  async getByCode(code: string, signal?: AbortSignal): Promise<Locale> {
    await tick(signal);
    const locale = this.locales.get(code.trim().toLowerCase());
    if (!locale || !locale.is_active) throw new RepositoryNotFoundError('locale', code);
    return copy(locale);
  }
}
