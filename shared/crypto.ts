import { createHash, randomUUID } from 'node:crypto';

export const randomId = (): string => randomUUID();

/** SHA-256 hex digest of a UTF-8 string. */
export const hashString = (value: string): string => createHash('sha256').update(value, 'utf8').digest('hex');
