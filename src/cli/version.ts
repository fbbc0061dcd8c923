/**
 * CLI version, read from the package manifest shipped beside src/ and dist/.
 */

import * as fs from 'node:fs';
import { z } from 'zod';

const PackageJsonSchema = z.object({ version: z.string() });

export function readVersion(): string {
  const raw = fs.readFileSync(new URL('../../package.json', import.meta.url), 'utf-8');
  return PackageJsonSchema.parse(JSON.parse(raw)).version;
}
