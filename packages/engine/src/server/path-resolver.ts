import * as path from "node:path";
import type { ResolvedPath } from "../http/types.js";
import type { IFileSystem } from "../interfaces/filesystem.js";

export const DEFAULT_DOCUMENT = "index.html";

/**
 * A target is treated as a directory when it ends with "/" or when its last
 * segment has no ".". This is a naming heuristic, not a stat: an existing
 * extensionless file is still classified as a directory.
 */
export function isDirectoryLike(target: string): boolean {
  if (target.endsWith("/")) {
    return true;
  }
  const lastSegment = target.slice(target.lastIndexOf("/") + 1);
  return !lastSegment.includes(".");
}

/** True when the last segment of a target is "." or "..". */
export function endsInDotSegment(target: string): boolean {
  const lastSegment = target.slice(target.lastIndexOf("/") + 1);
  return lastSegment === "." || lastSegment === "..";
}

export function isWithinRoot(absolutePath: string, root: string): boolean {
  const relative = path.relative(root, absolutePath);
  if (relative === "") {
    return true;
  }
  return (
    relative !== ".." &&
    !relative.startsWith(`..${path.sep}`) &&
    !path.isAbsolute(relative)
  );
}

export interface PathResolverOptions {
  root: string;
  fs: IFileSystem;
}

/**
 * Maps request targets onto files below a fixed document root.
 */
export class PathResolver {
  readonly root: string;
  private fs: IFileSystem;

  constructor(options: PathResolverOptions) {
    this.root = path.resolve(options.root);
    this.fs = options.fs;
  }

  /** Join a target onto the root and normalize it, without touching the disk. */
  toAbsolutePath(target: string): string {
    const withDocument = target.endsWith("/")
      ? target + DEFAULT_DOCUMENT
      : target;
    return path.join(this.root, withDocument.slice(1));
  }

  async resolve(target: string): Promise<ResolvedPath> {
    const absolutePath = this.toAbsolutePath(target);

    // Containment is decided on the normalized path; the filesystem is only
    // consulted for paths that stay inside the root.
    if (!isWithinRoot(absolutePath, this.root)) {
      return { absolutePath, existsAsFile: false, isWithinRoot: false };
    }

    // "/name/." addresses name as a directory, so it never reaches a file
    // even though it normalizes onto one.
    if (endsInDotSegment(target)) {
      return { absolutePath, existsAsFile: false, isWithinRoot: true };
    }

    return {
      absolutePath,
      existsAsFile: await this.isRegularFile(absolutePath),
      isWithinRoot: true,
    };
  }

  private async isRegularFile(absolutePath: string): Promise<boolean> {
    if (!(await this.fs.exists(absolutePath))) {
      return false;
    }
    const stat = await this.fs.stat(absolutePath);
    return stat.isFile;
  }
}
