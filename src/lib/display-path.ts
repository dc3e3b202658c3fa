import { basename, isAbsolute, relative, resolve, sep } from 'node:path';

/**
 * Path shown in log lines: relative to `baseDir` when the file lies inside
 * it, the bare file name otherwise.
 */
export function formatDisplayPath(filePath: string, baseDir?: string): string {
  if (baseDir) {
    const relativePath = relative(resolve(baseDir), resolve(filePath));
    const isInside =
      relativePath.length > 0 &&
      relativePath !== '..' &&
      !relativePath.startsWith(`..${sep}`) &&
      !isAbsolute(relativePath);
    if (isInside) {
      return relativePath;
    }
  }
  return basename(filePath);
}

/**
 * The first directory in `directories` that contains `filePath`.
 */
export function findBaseDir(filePath: string, directories: readonly string[]): string | undefined {
  const absoluteFile = resolve(filePath);
  return directories.find(directory => {
    const absoluteDir = resolve(directory);
    return absoluteFile === absoluteDir || absoluteFile.startsWith(`${absoluteDir}${sep}`);
  });
}
