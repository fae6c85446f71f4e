import fs from 'fs/promises';
import path from 'path';

/** Stores an upload under a collision-free id built from the time and the sanitised name. */
export const saveUpload = async (dir: string, originalName: string, buffer: Buffer, now = Date.now()) => {
  await fs.mkdir(dir, { recursive: true });
  const safeName = originalName.replace(/[^a-zA-Z0-9._-]/g, '_');
  const fileId = `${now}-${Math.random().toString(36).slice(2, 8)}-${safeName}`;
  await fs.writeFile(path.join(dir, fileId), buffer);
  return fileId;
};

/**
 * Deletes uploads last modified more than `maxAgeMs` ago. A confirmation for a
 * pruned upload answers 404.
 */
export const pruneUploads = async (dir: string, maxAgeMs: number, now = Date.now()) => {
  let names: string[];
  try {
    names = await fs.readdir(dir);
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return [];
    throw err;
  }

  const removed: string[] = [];
  for (const name of names) {
    const file = path.join(dir, name);
    const stats = await fs.stat(file);
    if (!stats.isFile() || now - stats.mtimeMs <= maxAgeMs) continue;
    await fs.rm(file, { force: true });
    removed.push(name);
  }
  if (removed.length) console.info(`Pruned ${removed.length} expired uploads`);
  return removed;
};
