/**
 * Abstract File System Interface
 *
 * The server only ever reads: it stats a resolved path and loads whole
 * files. Keeping this behind an interface lets tests swap in an in-memory
 * tree or inject read failures.
 */

export interface IFileStat {
  /** True only for a regular file; directories and other nodes are false. */
  isFile: boolean
}

export interface IFileSystem {
  /** Get file statistics. Rejects if the path does not exist. */
  stat(path: string): Promise<IFileStat>

  /** Check if a path exists. */
  exists(path: string): Promise<boolean>

  /** Read the full contents of a file. */
  readFile(path: string): Promise<Uint8Array>
}
