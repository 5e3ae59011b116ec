import { createHash, randomUUID } from 'node:crypto';

export const hashString = (input: string) => createHash('sha256').update(input).digest('hex');

/** 32-char hex token used for job ids. */
export const newToken = () => randomUUID().replace(/-/g, '');

/** Short hex suffix for cache-busting query strings. */
export const shortToken = (length = 6) => newToken().slice(0, length);
