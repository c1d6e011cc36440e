import { lstatSync } from 'fs';
import { join } from 'path';

export interface ProfileLocation {
  userDataDir: string;
  profileDirectory: string;
}

const PROFILE_FOLDER = /^(Default|Profile \d+)$/;

/**
 * Chromium-family browsers keep several profiles inside one user-data
 * directory. A stored path may point at either level:
 *
 *   C:\Users\me\AppData\Local\Microsoft\Edge\User Data\Profile 2
 *   -> { userDataDir: '...\User Data', profileDirectory: 'Profile 2' }
 *
 *   /home/me/.config/microsoft-edge
 *   -> { userDataDir: '/home/me/.config/microsoft-edge', profileDirectory: 'Default' }
 */
export function resolveProfileLocation(profilePath: string): ProfileLocation {
  const normalized = profilePath.replace(/\\/g, '/').replace(/\/+$/, '');
  const slash = normalized.lastIndexOf('/');
  const lastSegment = normalized.slice(slash + 1);

  if (slash > 0 && PROFILE_FOLDER.test(lastSegment)) {
    return {
      userDataDir: normalized.slice(0, slash),
      profileDirectory: lastSegment,
    };
  }

  return { userDataDir: normalized, profileDirectory: 'Default' };
}

// SingletonLock is a dangling symlink on Linux and macOS, so lstat rather than exists
const LOCK_FILES = ['SingletonLock', 'lockfile'];

export function isUserDataDirLocked(userDataDir: string): boolean {
  return LOCK_FILES.some((name) => {
    try {
      lstatSync(join(userDataDir, name));
      return true;
    } catch {
      return false;
    }
  });
}
