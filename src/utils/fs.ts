import { promises as fs } from "fs";
import path from "path";

export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

export async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

export async function isDirectory(dirPath: string): Promise<boolean> {
  try {
    return (await fs.stat(dirPath)).isDirectory();
  } catch {
    return false;
  }
}

export async function isRegularFile(filePath: string): Promise<boolean> {
  try {
    return (await fs.stat(filePath)).isFile();
  } catch {
    return false;
  }
}

export async function fileSize(filePath: string): Promise<number> {
  const stat = await fs.stat(filePath);
  return stat.size;
}

export async function readJson<T>(filePath: string): Promise<T> {
  const content = await fs.readFile(filePath, "utf8");
  return JSON.parse(content) as T;
}

/** Writes pretty JSON, refusing to replace an existing file. */
export async function writeJsonExclusive(filePath: string, data: unknown): Promise<void> {
  await ensureDir(path.dirname(filePath));
  await fs.writeFile(filePath, JSON.stringify(data, null, 2), { encoding: "utf8", flag: "wx" });
}

export async function createEmptyExclusive(filePath: string): Promise<void> {
  await ensureDir(path.dirname(filePath));
  await fs.writeFile(filePath, "", { encoding: "utf8", flag: "wx" });
}

export async function appendJsonLine(filePath: string, record: unknown): Promise<void> {
  await fs.appendFile(filePath, JSON.stringify(record) + "\n", "utf8");
}

/** Symlinks to regular files are listed; symlinked directories are not walked. */
export async function listFilesRecursive(
  rootDir: string,
  predicate: (filePath: string) => boolean
): Promise<string[]> {
  const results: string[] = [];
  async function walk(current: string): Promise<void> {
    const entries = await fs.readdir(current, { withFileTypes: true });
    for (const entry of entries) {
      const fullPath = path.join(current, entry.name);
      if (entry.isDirectory()) {
        await walk(fullPath);
      } else if (predicate(fullPath) && (entry.isFile() || (entry.isSymbolicLink() && (await isRegularFile(fullPath))))) {
        results.push(fullPath);
      }
    }
  }
  await walk(rootDir);
  return results;
}
