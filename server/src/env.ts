// Load environment variables FIRST, before any other imports
// This file must be imported at the very top of entry points
import dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';

// Nearest directory holding package.json; the same from server/src and from dist
function findProjectRoot(start: string): string {
  let dir = start;
  while (!fs.existsSync(path.join(dir, 'package.json'))) {
    const parent = path.dirname(dir);
    if (parent === dir) {
      return start;
    }
    dir = parent;
  }
  return dir;
}

export const PROJECT_ROOT = findProjectRoot(__dirname);

// .env holds local secrets, .env.defaults the committed defaults.
// dotenv never overrides a variable that is already set, so .env wins
dotenv.config({ path: path.join(PROJECT_ROOT, '.env') });
dotenv.config({ path: path.join(PROJECT_ROOT, '.env.defaults') });

export function configPathFromEnv(): string {
  return path.resolve(PROJECT_ROOT, process.env.MAILROOM_CONFIG || 'config.json');
}
