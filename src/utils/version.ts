import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';
import { getPackageRoot } from './paths.js';

const PackageJsonSchema = z.object({ version: z.string() }).passthrough();

export function getPackageVersion(): string {
  try {
    const pkgPath = join(getPackageRoot(), 'package.json');
    const parsed = PackageJsonSchema.safeParse(JSON.parse(readFileSync(pkgPath, 'utf-8')));
    return parsed.success ? parsed.data.version : '0.0.0';
  } catch {
    return '0.0.0';
  }
}
