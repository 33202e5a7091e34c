import { createHash } from 'node:crypto';

export function checksumFrom(value: string, algorithm: string = 'md5'): string {
  return createHash(algorithm).update(value, 'utf8').digest('hex');
}
