import { promises as fs } from "node:fs";
import { dirname } from "node:path";
import fsExtra from "fs-extra";

function hasErrorCode(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

export async function readTextFile(path: string): Promise<string | null> {
  try {
    const content = await fs.readFile(path, "utf8");
    return content;
  } catch (error: unknown) {
    if (hasErrorCode(error) && (error.code === "ENOENT" || error.code === "EISDIR" || error.code === "EACCES")) {
      return null;
    }
    throw error;
  }
}

export async function writeTextFile(path: string, content: string): Promise<void> {
  await fsExtra.ensureDir(dirname(path));
  const normalized = content.endsWith("\n") ? content : `${content}\n`;
  await fs.writeFile(path, normalized, "utf8");
}

export async function writeJsonFile(path: string, data: unknown): Promise<void> {
  await writeTextFile(path, JSON.stringify(data, null, 2));
}
