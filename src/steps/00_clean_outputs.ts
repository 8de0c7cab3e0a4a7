import fs from 'node:fs';
import path from 'node:path';
import { resolveDataDir } from '../utils';

function removePath(target: string): void {
  if (!fs.existsSync(target)) return;
  fs.rmSync(target, { recursive: true, force: true });
  console.info(`Removed ${target}`);
}

export function cleanOutputs(dataDir: string = resolveDataDir()): void {
  // Everything under decoded/ is rebuilt from data/replays.
  removePath(path.join(dataDir, 'decoded'));
}

if (require.main === module) {
  cleanOutputs();
}
