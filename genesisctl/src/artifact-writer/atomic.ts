import fs from "node:fs/promises";
import path from "node:path";

function tmpPathFor(dest: string): string {
  return path.join(path.dirname(dest), `.${path.basename(dest)}.tmp.${process.pid}.${Date.now()}`);
}

async function discard(tmp: string): Promise<void> {
  await fs.rm(tmp, { force: true });
}

/** Write text to `dest` through a temporary sibling and a rename. */
export async function atomicWriteFile(dest: string, content: string): Promise<void> {
  await fs.mkdir(path.dirname(dest), { recursive: true });
  const tmp = tmpPathFor(dest);
  try {
    const fh = await fs.open(tmp, "w");
    try {
      await fh.writeFile(content, "utf8");
      await fh.sync();
    } finally {
      await fh.close();
    }
    await fs.rename(tmp, dest);
  } catch (e) {
    await discard(tmp);
    throw e;
  }
}

export async function atomicWriteJson(dest: string, data: unknown): Promise<void> {
  await atomicWriteFile(dest, JSON.stringify(data, null, 2) + "\n");
}

/** Copy `src` to `dest` through a temporary sibling and a rename. */
export async function atomicCopyFile(src: string, dest: string): Promise<void> {
  await fs.mkdir(path.dirname(dest), { recursive: true });
  const tmp = tmpPathFor(dest);
  try {
    await fs.copyFile(src, tmp);
    await fs.rename(tmp, dest);
  } catch (e) {
    await discard(tmp);
    throw e;
  }
}

/**
 * Move `src` to `dest`. A plain rename when both sit on one filesystem,
 * otherwise a copy through a temporary sibling.
 */
export async function atomicMoveFile(src: string, dest: string): Promise<void> {
  await fs.mkdir(path.dirname(dest), { recursive: true });
  try {
    await fs.rename(src, dest);
  } catch (e) {
    if (!(e instanceof Error && "code" in e && e.code === "EXDEV")) throw e;
    await atomicCopyFile(src, dest);
    await fs.rm(src, { force: true });
  }
}
