import path from 'path';
import fs from 'fs';

// Walk up from this file until package.json is found, so paths stay stable
// regardless of the directory the process was started from.
function findProjectRoot(startPath: string): string {
  let currentDir = startPath;
  while (currentDir !== path.parse(currentDir).root) {
    if (fs.existsSync(path.join(currentDir, 'package.json'))) {
      return currentDir;
    }
    currentDir = path.dirname(currentDir);
  }
  return process.cwd();
}

const PROJECT_ROOT = findProjectRoot(__dirname);

export function getProjectRoot(): string {
  return PROJECT_ROOT;
}
