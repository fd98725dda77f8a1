import path from "path";
import type { CategoryMap } from "../manifest/loadManifest";
import { SetupError } from "../gate/setupError";
import type { Category } from "../types/category";
import { fileSize, isDirectory, isRegularFile, listFilesRecursive } from "../utils/fs";

export interface CorpusFile {
  absPath: string;
  relpath: string;
  category: Category | null;
  sizeBytes: number;
}

export interface EnumerateOptions {
  corpusDir: string;
  categoryMap: CategoryMap;
  extension: string;
  /** 0 means no cap. */
  maxFiles: number;
}

function toPosix(relative: string): string {
  return relative.split(path.sep).join("/");
}

function compareRelpaths(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function isInsideCorpus(corpusDir: string, relpath: string): boolean {
  const relative = path.relative(path.resolve(corpusDir), path.resolve(corpusDir, relpath));
  return relative !== "" && relative !== ".." && !relative.startsWith(`..${path.sep}`) && !path.isAbsolute(relative);
}

async function fromManifest(corpusDir: string, categoryMap: CategoryMap): Promise<string[]> {
  const relpaths: string[] = [];
  for (const relpath of categoryMap.keys()) {
    if (!isInsideCorpus(corpusDir, relpath)) continue;
    if (await isRegularFile(path.join(corpusDir, relpath))) {
      relpaths.push(relpath);
    }
  }
  return relpaths;
}

async function fromScan(corpusDir: string, extension: string): Promise<string[]> {
  const files = await listFilesRecursive(corpusDir, (filePath) => filePath.endsWith(extension));
  return files.map((filePath) => toPosix(path.relative(corpusDir, filePath))).sort(compareRelpaths);
}

/**
 * Resolves the files to run. The manifest decides both membership and order
 * when it names any file that exists under the corpus root; otherwise the corpus directory is
 * scanned and sorted by relpath.
 */
export async function enumerateCorpus(options: EnumerateOptions): Promise<CorpusFile[]> {
  const { corpusDir, categoryMap } = options;
  if (!(await isDirectory(corpusDir))) {
    throw new SetupError("corpus_dir_missing", `corpus dir not found: ${corpusDir}`);
  }

  let relpaths = categoryMap.size > 0 ? await fromManifest(corpusDir, categoryMap) : [];
  if (relpaths.length === 0) {
    relpaths = await fromScan(corpusDir, options.extension);
  }

  if (options.maxFiles > 0) {
    relpaths = relpaths.slice(0, options.maxFiles);
  }

  if (relpaths.length === 0) {
    throw new SetupError("empty_corpus", `no ${options.extension} files under: ${corpusDir}`);
  }

  const files: CorpusFile[] = [];
  for (const relpath of relpaths) {
    const absPath = path.join(corpusDir, relpath);
    files.push({
      absPath,
      relpath,
      category: categoryMap.get(relpath) ?? null,
      sizeBytes: await fileSize(absPath)
    });
  }
  return files;
}
