/**
 * Executable lookup on the search path.
 */

import fs from 'node:fs';
import path from 'node:path';
import type { ExecutableLocator } from './types.js';

/**
 * Locator over a PATH-style variable. On Windows each PATHEXT extension is
 * tried as well.
 */
export function pathLocator(env: NodeJS.ProcessEnv = process.env): ExecutableLocator {
  return {
    find(name: string): string | null {
      const dirs = (env.PATH ?? env.Path ?? '').split(path.delimiter).filter(Boolean);
      const exts =
        process.platform === 'win32'
          ? ['', ...(env.PATHEXT ?? '.EXE;.CMD;.BAT;.COM').split(';')]
          : [''];

      for (const dir of dirs) {
        for (const ext of exts) {
          const candidate = path.join(dir, name + ext);
          if (isRunnable(candidate)) return candidate;
        }
      }
      return null;
    },
  };
}

function isRunnable(candidate: string): boolean {
  try {
    if (!fs.statSync(candidate).isFile()) return false;
    fs.accessSync(candidate, fs.constants.X_OK);
    return true;
  } catch {
    return false;
  }
}
