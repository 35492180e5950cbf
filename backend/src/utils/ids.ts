import { randomUUID } from 'crypto';

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export type IdGenerator = () => string;
export type Clock = () => Date;

export const newId: IdGenerator = () => randomUUID();
export const systemClock: Clock = () => new Date();

export function isUuid(value: string): boolean {
  return UUID_PATTERN.test(value.trim());
}
