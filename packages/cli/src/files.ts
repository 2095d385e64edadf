import { readdir, stat } from 'node:fs/promises';
import path from 'node:path';

/** Recursively list the .html files under `root`, sorted for stable output */
export async function findHtmlFiles(root: string): Promise<string[]> {
  const entries = await readdir(root, { recursive: true });
  const files: string[] = [];

  for (const entry of entries.filter((name) => name.endsWith('.html')).sort()) {
    const filePath = path.join(root, entry);
    if ((await stat(filePath)).isFile()) {
      files.push(filePath);
    }
  }

  return files;
}
