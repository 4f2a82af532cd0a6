import fg from 'fast-glob';
import fs from 'node:fs/promises';

export type InputResolution = {
  /** Readable files, in argument order; glob matches sorted within their argument. */
  files: string[];
  /** Arguments that are neither an existing file nor a glob with matches. */
  unknown: string[];
};

const DEFAULT_EXCLUDES = ['**/node_modules/**', '**/.git/**'];

function toPosixPath(p: string): string {
  return p.replace(/\\/g, '/');
}

async function isFile(p: string): Promise<boolean> {
  try {
    return (await fs.stat(p)).isFile();
  } catch {
    return false;
  }
}

/**
 * Resolve command-line input arguments to files.
 * An argument is used as-is when it names an existing file; otherwise, if it contains glob
 * syntax, it is expanded with fast-glob. Duplicates keep their first position.
 */
export async function resolveInputFiles(args: string[]): Promise<InputResolution> {
  const files: string[] = [];
  const unknown: string[] = [];
  const seen = new Set<string>();
  const add = (f: string) => {
    if (seen.has(f)) return;
    seen.add(f);
    files.push(f);
  };

  for (const arg of args) {
    if (await isFile(arg)) {
      add(arg);
      continue;
    }
    if (!fg.isDynamicPattern(toPosixPath(arg))) {
      unknown.push(arg);
      continue;
    }

    const matches = await fg(toPosixPath(arg), {
      onlyFiles: true,
      unique: true,
      dot: false,
      followSymbolicLinks: false,
      ignore: DEFAULT_EXCLUDES,
    });
    matches.sort((a, b) => a.localeCompare(b));
    if (matches.length === 0) unknown.push(arg);
    matches.forEach(add);
  }

  return { files, unknown };
}
