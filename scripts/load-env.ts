/**
 * Side-effect import for the entry scripts: fills process.env from the repo's
 * env files before config is read. ENV_FILE, when set, is loaded first.
 */
import { config } from 'dotenv';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

const repoRoot = fileURLToPath(new URL('..', import.meta.url));

// dotenv never overrides a variable that is already set, so earlier files win.
for (const file of [process.env.ENV_FILE, '.env.local', '.env']) {
  if (file) config({ path: path.resolve(repoRoot, file) });
}
