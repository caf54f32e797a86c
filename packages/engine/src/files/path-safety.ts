import * as path from "node:path";
import { fail, ok, type Result } from "../errors/app-error.js";
import type { IFileSystem } from "../interfaces/filesystem.js";

export const UPLOADS_PREFIX = "uploads/";

/**
 * Map a `/uploads/...` request path to a real file under `uploadsRoot`.
 *
 * Both sides are canonicalized through `realpath`, so `..` segments and
 * symlinks that lead outside the root are caught.
 */
export async function resolveViewPath(
  requested: string,
  uploadsRoot: string,
  fs: IFileSystem,
  allowedExtensions: readonly string[],
): Promise<Result<string>> {
  let relative = requested.replace(/^\/+/, "");
  while (relative.startsWith(UPLOADS_PREFIX)) {
    relative = relative.slice(UPLOADS_PREFIX.length);
  }

  try {
    relative = decodeURIComponent(relative);
  } catch (err) {
    return fail("Invalid", `Malformed percent-encoding in path: ${requested}`, err);
  }

  const candidate = `${uploadsRoot}${path.sep}${relative}`;

  let resolved: string;
  try {
    resolved = await fs.realpath(candidate);
  } catch (err) {
    return fail("NotFound", `File not found: ${relative}`, err);
  }

  let root: string;
  try {
    root = await fs.realpath(uploadsRoot);
  } catch (err) {
    return fail("IO", `Uploads directory is unavailable: ${uploadsRoot}`, err);
  }

  if (!isWithin(resolved, root)) {
    return fail("NotPermitted", `Path escapes the uploads directory: ${requested}`);
  }

  const name = validateFileName(path.basename(resolved), allowedExtensions);
  if (!name.ok) return name;
  return ok(resolved);
}

/**
 * Where an uploaded file named `fileName` is stored. The check is lexical
 * only: `.` and `..` are folded without touching the disk, so a symlink
 * already inside the root is followed on write.
 */
export function resolveUploadPath(
  fileName: string,
  uploadsRoot: string,
  allowedExtensions: readonly string[],
): Result<string> {
  if (path.isAbsolute(fileName) || path.win32.isAbsolute(fileName)) {
    return fail("NotPermitted", `Absolute upload path: ${fileName}`);
  }

  const segments = ["uploads"];
  for (const segment of fileName.split(/[\\/]/)) {
    if (segment === "" || segment === ".") continue;
    if (segment === "..") {
      segments.pop();
    } else {
      segments.push(segment);
    }
  }

  if (segments[0] !== "uploads") {
    return fail("NotPermitted", `Upload path escapes the uploads directory: ${fileName}`);
  }

  const baseName = segments.length > 1 ? segments[segments.length - 1] : "";
  const name = validateFileName(baseName, allowedExtensions);
  if (!name.ok) return name;

  return ok(path.join(uploadsRoot, ...segments.slice(1)));
}

/** Non-empty, well-formed Unicode, with an allowed extension. */
export function validateFileName(
  name: string,
  allowedExtensions: readonly string[],
): Result<string> {
  if (name.length === 0) {
    return fail("Invalid", "File name is empty");
  }
  if (hasLoneSurrogate(name)) {
    return fail("Invalid", "File name is not valid Unicode");
  }

  const dot = name.lastIndexOf(".");
  const extension = dot > 0 ? name.slice(dot + 1) : "";
  if (!allowedExtensions.includes(extension)) {
    return fail("Invalid", `File type not allowed: ${name}`);
  }
  return ok(name);
}

/** True when `target` is `root` itself or lies beneath it. */
export function isWithin(target: string, root: string): boolean {
  const relative = path.relative(root, target);
  return (
    relative === "" ||
    (relative !== ".." &&
      !relative.startsWith(`..${path.sep}`) &&
      !path.isAbsolute(relative))
  );
}

function hasLoneSurrogate(value: string): boolean {
  for (let i = 0; i < value.length; i++) {
    const code = value.charCodeAt(i);
    if (code >= 0xd800 && code <= 0xdbff) {
      const next = value.charCodeAt(i + 1);
      if (!(next >= 0xdc00 && next <= 0xdfff)) return true;
      i++;
    } else if (code >= 0xdc00 && code <= 0xdfff) {
      return true;
    }
  }
  return false;
}
