import fs from 'fs';
import path from 'path';

/**
 * Checks the shape, not the prototype: `fs` errors may come from another realm.
 */
export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string';
}

export function statOrUndefined(fileName: string): fs.Stats | undefined {
  try {
    return fs.statSync(fileName);
  } catch (err) {
    if (isErrnoException(err) && (err.code === 'ENOENT' || err.code === 'ENOTDIR')) {
      return undefined;
    }
    throw err;
  }
}

export function isDirectory(fileName: string): boolean {
  return !!statOrUndefined(fileName)?.isDirectory();
}

/**
 * Absolute, symlink-free spelling of an existing path.
 */
export function canonicalPath(fileName: string, cwd: string = process.cwd()): string {
  return fs.realpathSync.native(path.resolve(cwd, fileName));
}

export function isSameOrInside(child: string, parent: string): boolean {
  const relative = path.relative(parent, child);
  return relative === '' || (!relative.startsWith('..') && !path.isAbsolute(relative));
}

export async function parseJson(fileName: string): Promise<unknown> {
  try {
    const content = await fs.promises.readFile(fileName, 'utf-8');
    return JSON.parse(content);
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ENOENT') {
      return undefined;
    }
    throw err;
  }
}

/**
 * Writes through a temporary sibling and renames it into place so readers never see a partial file.
 */
export function atomicWriteFileSync(fileName: string, content: string): void {
  const tmp = `${fileName}.tmp.${process.pid}.${Date.now().toString(36)}`;
  fs.mkdirSync(path.dirname(fileName), { recursive: true });
  try {
    fs.writeFileSync(tmp, content, 'utf-8');
    fs.renameSync(tmp, fileName);
  } catch (err) {
    fs.rmSync(tmp, { force: true });
    throw err;
  }
}
