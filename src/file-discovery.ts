import * as fsp from "fs/promises";
import * as path from "path";

export const DEFAULT_VIDEO_EXTENSIONS: readonly string[] = [".mp4", ".mkv"];

// "MKV" and ".mkv" both become ".mkv"
export function normalizeExtensions(extensions: readonly string[]): string[] {
  const normalized = extensions
    .map((ext) => ext.trim().toLowerCase())
    .filter((ext) => ext && ext !== ".")
    .map((ext) => (ext.startsWith(".") ? ext : `.${ext}`));
  return [...new Set(normalized)];
}

export async function isDirectory(folder: string): Promise<boolean> {
  try {
    const stats = await fsp.stat(folder);
    return stats.isDirectory();
  } catch (error) {
    if (isMissingPath(error)) {
      return false;
    }
    throw error;
  }
}

// Recursively find every file under `folder` with a matching extension,
// sorted by path. Symlinked files are included; symlinked directories are
// not followed.
export async function findVideoFiles(
  folder: string,
  extensions: readonly string[] = DEFAULT_VIDEO_EXTENSIONS
): Promise<string[]> {
  const wanted = new Set(normalizeExtensions(extensions));
  const found = new Set<string>();

  async function walkDirectory(dir: string) {
    const entries = await fsp.readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        await walkDirectory(fullPath);
      } else if (
        wanted.has(path.extname(entry.name).toLowerCase()) &&
        (entry.isFile() || (entry.isSymbolicLink() && (await isFile(fullPath))))
      ) {
        found.add(fullPath);
      }
    }
  }

  await walkDirectory(folder);
  return [...found].sort((a, b) =>
    comparePathParts(
      path.relative(folder, a).split(path.sep),
      path.relative(folder, b).split(path.sep)
    )
  );
}

// Component by component, so "Show/ep1.mkv" sorts before "Show - Extras.mkv"
export function comparePathParts(
  a: readonly string[],
  b: readonly string[]
): number {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    if (a[i] !== b[i]) {
      return a[i] < b[i] ? -1 : 1;
    }
  }
  return a.length - b.length;
}

async function isFile(target: string): Promise<boolean> {
  try {
    return (await fsp.stat(target)).isFile();
  } catch (error) {
    // dangling link
    if (isMissingPath(error)) {
      return false;
    }
    throw error;
  }
}

function isMissingPath(error: unknown): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    (error.code === "ENOENT" || error.code === "ENOTDIR")
  );
}
