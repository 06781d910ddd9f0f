import * as fs from 'node:fs';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';

/**
 * True when the module at `moduleUrl` is the script node was started with.
 *
 * npm installs `bin` entries as symlinks, so both sides are compared after
 * resolving links.
 */
export function isEntryPoint(moduleUrl: string, scriptPath: string | undefined = process.argv[1]): boolean {
  if (!scriptPath) return false;

  const modulePath = fileURLToPath(moduleUrl);
  const resolved = path.resolve(scriptPath);
  if (resolved === modulePath) return true;
  if (!fs.existsSync(resolved)) return false;

  return fs.realpathSync(resolved) === fs.realpathSync(modulePath);
}
