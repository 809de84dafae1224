import { dirname, join } from 'node:path';
import { existsSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

let cachedPackageRoot: string | null = null;

export function getPackageRoot(): string {
  if (cachedPackageRoot) return cachedPackageRoot;
  // src/utils(테스트) 와 dist/src/utils(빌드) 깊이가 달라 package.json 을 찾아 올라간다
  let dir = __dirname;
  while (!existsSync(join(dir, 'package.json'))) {
    const parent = dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  cachedPackageRoot = dir;
  return dir;
}

export function getTemplatesDir(): string {
  return join(getPackageRoot(), 'templates');
}
