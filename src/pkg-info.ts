import { readFileSync } from 'node:fs';

import { z } from 'zod';

const PkgInfoSchema = z.object({
  name: z.string(),
  version: z.string(),
  description: z.string().optional(),
});

// Resolves to the package root from both src/ and dist/.
const packageJsonRaw: unknown = JSON.parse(
  readFileSync(new URL('../package.json', import.meta.url), 'utf8')
);

export const pkgInfo = PkgInfoSchema.parse(packageJsonRaw);
