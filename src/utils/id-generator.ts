import { randomBytes, randomUUID } from 'node:crypto';

/** Handle for documents and units; unique across every document of the process */
export function generateId(prefix = ''): string {
  const uuid = randomUUID();
  return prefix ? `${prefix}_${uuid}` : uuid;
}

/** Eight hex characters, for names that only need to be unique on disk for a moment */
export function shortToken(): string {
  return randomBytes(4).toString('hex');
}
