import * as path from "node:path";
import { fail, ok, type Result } from "../errors/app-error.js";
import { readBufferedFile } from "../files/file-store.js";
import type { IFileSystem } from "../interfaces/filesystem.js";
import { decodeToString } from "../utils/buffer.js";

export type TemplateName =
  | "index.html"
  | "upload.html"
  | "bad-request.html"
  | "access-denied.html"
  | "page-not-found.html"
  | "file-not-found.html"
  | "server-error.html";

/** HTML pages on disk, with `{{KEY}}` placeholders. */
export class TemplateStore {
  constructor(
    private readonly fs: IFileSystem,
    readonly dir: string,
  ) {}

  path(name: TemplateName): string {
    return path.join(this.dir, name);
  }

  async render(
    name: TemplateName,
    vars: Record<string, string> = {},
  ): Promise<Result<string>> {
    const file = await readBufferedFile(this.fs, this.path(name));
    if (!file.ok) {
      // A template the server ships with going missing is a deployment fault.
      return fail("IO", `Template unavailable: ${name}`, file.error);
    }

    let html = decodeToString(file.value.content);
    for (const [key, value] of Object.entries(vars)) {
      html = html.split(`{{${key}}}`).join(value);
    }
    return ok(html);
  }
}
