import * as path from "node:path";
import {
  errnoCode,
  fail,
  ok,
  type Result,
} from "../errors/app-error.js";
import type { BufferedFile } from "../http/types.js";
import type {
  IFileHandle,
  IFileStat,
  IFileSystem,
} from "../interfaces/filesystem.js";
import type { KeyedLock } from "./keyed-lock.js";

/** A listed file. Both fields are relative to the listed root and `/`-separated. */
export interface FileEntry {
  name: string;
  path: string;
}

/** Every regular file under `root`, recursively, sorted by path. */
export async function listFiles(
  fs: IFileSystem,
  root: string,
): Promise<Result<FileEntry[]>> {
  const files: FileEntry[] = [];
  const walked = await walk(fs, root, "", files);
  if (!walked.ok) return walked;
  files.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
  return ok(files);
}

async function walk(
  fs: IFileSystem,
  dir: string,
  prefix: string,
  files: FileEntry[],
): Promise<Result<void>> {
  let names: string[];
  try {
    names = await fs.readdir(dir);
  } catch (err) {
    return fail("IO", `Failed to read directory: ${dir}`, err);
  }

  for (const name of names) {
    const fullPath = path.join(dir, name);
    const relative = prefix ? `${prefix}/${name}` : name;

    let stat: IFileStat;
    try {
      stat = await fs.stat(fullPath);
    } catch (err) {
      return fail("IO", `Failed to read entry: ${fullPath}`, err);
    }

    if (stat.isDirectory) {
      const nested = await walk(fs, fullPath, relative, files);
      if (!nested.ok) return nested;
    } else if (stat.isFile) {
      files.push({ name: relative, path: relative });
    }
  }
  return ok(undefined);
}

/** Load a whole file into memory, named after its base name. */
export async function readBufferedFile(
  fs: IFileSystem,
  filePath: string,
): Promise<Result<BufferedFile>> {
  const name = path.basename(filePath);

  let stat: IFileStat;
  try {
    stat = await fs.stat(filePath);
  } catch (err) {
    const code = errnoCode(err);
    return code === "ENOENT" || code === "ENOTDIR"
      ? fail("NotFound", `File does not exist: ${filePath}`, err)
      : fail("IO", `Failed to stat file: ${filePath}`, err);
  }
  if (stat.isDirectory) {
    return fail("NotFound", `Path for file is a directory: ${filePath}`);
  }

  let handle: IFileHandle;
  try {
    handle = await fs.open(filePath, "r");
  } catch (err) {
    return fail("NotFound", `File failed to open: ${name}`, err);
  }

  const content = await readAll(handle, stat.size, name);
  const closed = await closeHandle(handle, name);
  if (!content.ok) return content;
  if (!closed.ok) return closed;
  return ok({ name, content: content.value });
}

/**
 * Write `file` to `filePath`, replacing anything already there. Writes to the
 * same path queue behind each other on `locks`.
 */
export function saveFile(
  fs: IFileSystem,
  filePath: string,
  file: BufferedFile,
  locks: KeyedLock,
): Promise<Result<void>> {
  return locks.run(filePath, async () => {
    let handle: IFileHandle;
    try {
      handle = await fs.open(filePath, "w");
    } catch (err) {
      return fail("IO", `Failed to create file: ${file.name}`, err);
    }

    const written = await writeAll(handle, file.content, file.name);
    const closed = await closeHandle(handle, file.name);
    if (!written.ok) return written;
    return closed;
  });
}

async function readAll(
  handle: IFileHandle,
  size: number,
  name: string,
): Promise<Result<Uint8Array>> {
  const content = new Uint8Array(size);
  let position = 0;
  try {
    while (position < size) {
      const { bytesRead } = await handle.read(
        content,
        position,
        size - position,
        position,
      );
      if (bytesRead === 0) break;
      position += bytesRead;
    }
  } catch (err) {
    return fail("IO", `Error reading file into buffer: ${name}`, err);
  }
  return ok(content.subarray(0, position));
}

async function writeAll(
  handle: IFileHandle,
  content: Uint8Array,
  name: string,
): Promise<Result<void>> {
  let position = 0;
  try {
    while (position < content.length) {
      const { bytesWritten } = await handle.write(
        content,
        position,
        content.length - position,
        position,
      );
      position += bytesWritten;
    }
  } catch (err) {
    return fail("IO", `Failed to write file: ${name}`, err);
  }
  return ok(undefined);
}

async function closeHandle(
  handle: IFileHandle,
  name: string,
): Promise<Result<void>> {
  try {
    await handle.close();
    return ok(undefined);
  } catch (err) {
    return fail("IO", `Failed to close file: ${name}`, err);
  }
}
