import type { IFileStat, IFileSystem } from "../interfaces/filesystem.js";

/**
 * Read-mostly file tree kept in memory. Paths are absolute and use "/".
 */
export class InMemoryFileSystem implements IFileSystem {
  private readonly files = new Map<string, Uint8Array>();
  private readonly directories = new Set<string>(["/"]);

  async stat(path: string): Promise<IFileStat> {
    const normalized = normalizePath(path);

    if (this.files.has(normalized)) {
      return { isFile: true };
    }
    if (this.directories.has(normalized)) {
      return { isFile: false };
    }

    throw new Error(`ENOENT: no such file or directory: ${normalized}`);
  }

  async exists(path: string): Promise<boolean> {
    const normalized = normalizePath(path);
    return this.files.has(normalized) || this.directories.has(normalized);
  }

  async readFile(path: string): Promise<Uint8Array> {
    const normalized = normalizePath(path);
    if (this.directories.has(normalized)) {
      throw new Error(`EISDIR: illegal operation on a directory: ${normalized}`);
    }
    const file = this.files.get(normalized);
    if (!file) {
      throw new Error(`ENOENT: no such file or directory: ${normalized}`);
    }
    return file.slice();
  }

  async mkdir(path: string): Promise<void> {
    this.ensureDirectory(normalizePath(path));
  }

  async writeFile(path: string, data: Uint8Array): Promise<void> {
    const normalized = normalizePath(path);
    if (this.directories.has(normalized)) {
      throw new Error(`EISDIR: cannot write to directory: ${normalized}`);
    }
    this.ensureDirectory(parentDirectory(normalized));
    this.files.set(normalized, data.slice());
  }

  private ensureDirectory(path: string): void {
    const segments = path === "/" ? [] : path.slice(1).split("/");
    let current = "/";
    for (const segment of segments) {
      current = current === "/" ? `/${segment}` : `${current}/${segment}`;
      if (this.files.has(current)) {
        throw new Error(
          `ENOTDIR: file exists where directory expected: ${current}`,
        );
      }
      this.directories.add(current);
    }
  }
}

function normalizePath(path: string): string {
  const slashNormalized = path.replace(/\\/g, "/");
  const withRoot = slashNormalized.startsWith("/")
    ? slashNormalized
    : `/${slashNormalized}`;

  const output: string[] = [];
  for (const part of withRoot.split("/")) {
    if (part === "" || part === ".") {
      continue;
    }
    if (part === "..") {
      output.pop();
      continue;
    }
    output.push(part);
  }

  return output.length === 0 ? "/" : `/${output.join("/")}`;
}

function parentDirectory(path: string): string {
  const idx = path.lastIndexOf("/");
  return idx <= 0 ? "/" : path.slice(0, idx);
}
