import { existsSync } from "fs";
import { homedir } from "os";
import { resolve, dirname, join } from "path";

const HOME_DIRNAME = ".recollect";

function findWorkHome(): string | null {
  let dir = process.cwd();
  for (let i = 0; i < 20; i++) {
    const candidate = resolve(dir, HOME_DIRNAME);
    if (existsSync(candidate)) return candidate;
    const parent = dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  return null;
}

let _homeDir: string | null = null;

export function getHomeDir(): string {
  if (!_homeDir) {
    const fromEnv = process.env.RECOLLECT_HOME?.trim();
    _homeDir = fromEnv || findWorkHome() || join(homedir(), HOME_DIRNAME);
  }
  return _homeDir;
}

export function setHomeDir(dir: string): void {
  _homeDir = dir;
}
