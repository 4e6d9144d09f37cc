/**
 * Package version, read from package.json next to src/ or dist/.
 */
import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';

const __dirname = dirname(fileURLToPath(import.meta.url));

const PackageJsonSchema = z.object({ version: z.string() });

export const VERSION = `v${
  PackageJsonSchema.parse(JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8'))).version
}`;
