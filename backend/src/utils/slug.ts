import slugify from 'slugify';

const ENVIRONMENT_KEY_PATTERN = /^[a-z0-9_-]+$/;

export const generateSlug = (text: string): string => {
  return slugify(text, {
    lower: true,
    strict: true,
    remove: /[*+~.()'"!:@]/g,
  });
};

/**
 * Canonical form of environment keys and slug lookups
 */
export const normalizeKey = (key: string | null | undefined): string => (key ?? '').trim().toLowerCase();

export const isValidEnvironmentKey = (key: string): boolean => ENVIRONMENT_KEY_PATTERN.test(key);

/**
 * Display name derived from a key: `staging` -> `Staging`
 */
export const deriveName = (key: string): string => {
  const trimmed = key.trim();
  return trimmed === '' ? '' : trimmed.charAt(0).toUpperCase() + trimmed.slice(1);
};
