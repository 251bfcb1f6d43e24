import type { ParsedRequest, ResponseOutcome } from "../http/types.js";
import { SUPPORTED_METHODS } from "../http/types.js";
import { isDirectoryLike, type PathResolver } from "./path-resolver.js";

function isSupportedMethod(method: string): boolean {
  return SUPPORTED_METHODS.some((supported) => supported === method);
}

/**
 * Pick the response category for a request. Checks run in a fixed order and
 * the first one that fails decides: method, then directory redirect, then
 * containment and existence.
 */
export async function decideOutcome(
  request: ParsedRequest,
  resolver: PathResolver,
): Promise<ResponseOutcome> {
  if (!isSupportedMethod(request.method)) {
    return { kind: "methodNotAllowed" };
  }

  const { target } = request;
  if (isDirectoryLike(target) && !target.endsWith("/")) {
    return { kind: "redirect", target };
  }

  const resolved = await resolver.resolve(target);
  if (!resolved.isWithinRoot || !resolved.existsAsFile) {
    return { kind: "notFound" };
  }

  return { kind: "ok", filePath: resolved.absolutePath };
}
