import { existsSync, statSync } from 'fs';

/**
 * True when `fileName` may be written: overwriting is allowed or no regular file is there yet
 */
export function canCreateFile(fileName: string, overwrite: boolean): boolean {
  if (overwrite) {
    return true;
  }
  return !(existsSync(fileName) && statSync(fileName).isFile());
}

/**
 * `<root>_<kind>.<extension>`
 */
export function outputFileName(root: string, kind: string, extension: string): string {
  return `${root}_${kind}.${extension}`;
}
