import { isAbsolute, relative, resolve } from "node:path";

/** Assert that candidate path resolves within root. Throws on violation. */
export function assertPathConfined(candidate: string, root: string): void {
  const resolved = resolve(candidate);
  const rootResolved = resolve(root);
  const rel = relative(rootResolved, resolved);
  if (rel === "" || rel.startsWith("..") || isAbsolute(rel)) {
    throw new Error(`Path confinement violation: "${candidate}" resolves outside "${root}"`);
  }
}

/** Resolve a relative path under root, refusing anything that escapes it */
export function resolveConfined(root: string, relPath: string): string {
  if (isAbsolute(relPath)) {
    throw new Error(`Path confinement violation: "${relPath}" is absolute`);
  }
  const target = resolve(root, relPath);
  assertPathConfined(target, root);
  return target;
}
