import fs from "node:fs";
import path from "node:path";

/** Writes beside the target as `<file>.part`, then renames over it. */
export async function writeFileAtomic(filePath: string, data: string | Buffer): Promise<void> {
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
  const tempPath = `${filePath}.part`;

  try {
    await fs.promises.writeFile(tempPath, data);
    await fs.promises.rename(tempPath, filePath);
  } catch (error) {
    await fs.promises.rm(tempPath, { force: true });
    throw error;
  }
}

export async function writeJsonAtomic(filePath: string, value: unknown): Promise<void> {
  await writeFileAtomic(filePath, `${JSON.stringify(value, null, 2)}\n`);
}
