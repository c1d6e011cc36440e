import { readFileSync, writeFileSync, existsSync, mkdirSync, renameSync } from 'fs';
import { dirname, join, basename } from 'path';
import { randomUUID } from 'crypto';
import { info } from '../logging/logger.js';
import { NotFoundError, ValidationError } from '../errors.js';

export interface Profile {
  id: string;
  name: string;
  /** Browser user-data directory, optionally ending in a profile folder */
  path: string;
  createdAt: string;
}

export interface ProfileChanges {
  name?: string;
  path?: string;
}

function isProfile(value: unknown): value is Profile {
  if (typeof value !== 'object' || value === null) return false;
  const candidate: Record<string, unknown> = { ...value };
  return (
    typeof candidate.id === 'string' &&
    typeof candidate.name === 'string' &&
    typeof candidate.path === 'string' &&
    typeof candidate.createdAt === 'string'
  );
}

function requireText(value: unknown, field: 'name' | 'path'): string {
  const text = typeof value === 'string' ? value.trim() : '';
  if (!text) {
    throw new ValidationError(`Profile ${field} must not be empty`);
  }
  return text;
}

/**
 * Durable list of browser profiles backed by a JSON file.
 *
 * Every mutation rewrites the whole file before returning. The write goes to
 * a sibling temp file first and is renamed over the old one.
 */
export class ProfileStore {
  private profiles: Profile[];

  constructor(private readonly filePath: string) {
    this.profiles = this.load();
  }

  private load(): Profile[] {
    if (!existsSync(this.filePath)) {
      return [];
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(this.filePath, 'utf-8'));
    } catch (error) {
      throw new Error(`Failed to read profiles from ${this.filePath}: ${error}`);
    }

    if (!Array.isArray(parsed) || !parsed.every(isProfile)) {
      throw new Error(`Profiles file ${this.filePath} is not a list of profiles`);
    }

    info(`Loaded ${parsed.length} profile(s) from ${this.filePath}`, 'Profiles');
    return parsed;
  }

  private persist(profiles: Profile[]): void {
    const dir = dirname(this.filePath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }

    const tempPath = join(dir, `.${basename(this.filePath)}.${process.pid}.tmp`);
    writeFileSync(tempPath, JSON.stringify(profiles, null, 2));
    renameSync(tempPath, this.filePath);
  }

  /** Applies `next` only once it is on disk */
  private commit(next: Profile[]): void {
    this.persist(next);
    this.profiles = next;
  }

  add(name: string, path: string): Profile {
    const profile: Profile = {
      id: randomUUID(),
      name: requireText(name, 'name'),
      path: requireText(path, 'path'),
      createdAt: new Date().toISOString(),
    };

    this.commit([...this.profiles, profile]);
    info(`Added profile ${profile.name} (${profile.id})`, 'Profiles');
    return { ...profile };
  }

  list(): Profile[] {
    return this.profiles.map((p) => ({ ...p }));
  }

  get(id: string): Profile {
    const profile = this.profiles.find((p) => p.id === id);
    if (!profile) {
      throw new NotFoundError(`Profile not found: ${id}`);
    }
    return { ...profile };
  }

  update(id: string, changes: ProfileChanges): Profile {
    const current = this.get(id);
    const updated: Profile = {
      ...current,
      name: changes.name === undefined ? current.name : requireText(changes.name, 'name'),
      path: changes.path === undefined ? current.path : requireText(changes.path, 'path'),
    };

    this.commit(this.profiles.map((p) => (p.id === id ? updated : p)));
    info(`Updated profile ${updated.name} (${id})`, 'Profiles');
    return { ...updated };
  }

  remove(id: string): void {
    const profile = this.get(id);
    this.commit(this.profiles.filter((p) => p.id !== id));
    info(`Removed profile ${profile.name} (${id})`, 'Profiles');
  }
}
