import { randomUUID } from 'node:crypto';

export function generateId(prefix?: string): string {
  const short = randomUUID().replace(/-/g, '').slice(0, 8);
  return prefix ? `${prefix}_${short}` : short;
}

export function now(): string {
  return new Date().toISOString();
}

/** Identity string used for pool uniqueness: "Artist - Track". */
export function trackKey(artist: string, name: string): string {
  return `${artist} - ${name}`;
}
