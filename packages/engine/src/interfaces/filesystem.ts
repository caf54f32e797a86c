/**
 * Abstract file system interfaces.
 *
 * Paths are plain strings in the host's format. Every method rejects with
 * the underlying runtime error; callers convert that into an AppError.
 */

export interface IFileStat {
  size: number;
  isDirectory: boolean;
  isFile: boolean;
}

export interface IFileHandle {
  /** Read data from the file at a specific position. */
  read(
    buffer: Uint8Array,
    offset: number,
    length: number,
    position: number,
  ): Promise<{ bytesRead: number }>;

  /** Write data to the file at a specific position. */
  write(
    buffer: Uint8Array,
    offset: number,
    length: number,
    position: number,
  ): Promise<{ bytesWritten: number }>;

  /** Close the file handle. */
  close(): Promise<void>;
}

export interface IFileSystem {
  /** Open a file. Mode "w" creates parent directories and truncates. */
  open(path: string, mode: "r" | "w"): Promise<IFileHandle>;

  /** Get file statistics, following symlinks. */
  stat(path: string): Promise<IFileStat>;

  /** Create a directory and any missing parents. */
  mkdir(path: string): Promise<void>;

  /** Read directory contents. Returns list of filenames (not full paths). */
  readdir(path: string): Promise<string[]>;

  /** Resolve symlinks and `..` segments; rejects when the path is missing. */
  realpath(path: string): Promise<string>;
}
