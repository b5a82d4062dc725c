/**
 * Transform lookup: named transforms bundled with the package, or
 * transform files relative to the working directory
 */

import { existsSync } from "fs";
import { readFile } from "fs/promises";
import { dirname, join, resolve } from "path";
import { fileURLToPath } from "url";
import { TransformNotFoundError, InputReadError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

const log = logger.child("transform");

export interface TransformSource {
  text: string;
  path: string;
}

export interface LocateOptions {
  transformsDir?: string;
  cwd?: string;
}

const NAMED_TRANSFORM = /^\w+$/;

/**
 * Find the bundled transforms directory by walking up from this module
 * to the package root. Works from both the sources and the bundle.
 */
export function defaultTransformsDir(): string {
  let dir = dirname(fileURLToPath(import.meta.url));
  for (;;) {
    if (existsSync(join(dir, "package.json")) && existsSync(join(dir, "transforms"))) {
      return join(dir, "transforms");
    }
    const parent = dirname(dir);
    if (parent === dir) {
      return join(process.cwd(), "transforms");
    }
    dir = parent;
  }
}

/**
 * Resolve a transform reference to its file path. A bare word names a
 * bundled transform; anything else is a path.
 */
export function resolveTransformPath(
  ref: string,
  options: LocateOptions = {},
): string {
  if (NAMED_TRANSFORM.test(ref)) {
    const namedPath = join(
      options.transformsDir ?? defaultTransformsDir(),
      `${ref}.yml`,
    );
    if (!existsSync(namedPath)) {
      throw new TransformNotFoundError(
        `Named transform not available: ${ref} (${namedPath})`,
        { transform: ref, path: namedPath },
      );
    }
    return namedPath;
  }

  const filePath = resolve(options.cwd ?? process.cwd(), ref);
  if (!existsSync(filePath)) {
    throw new TransformNotFoundError(`Transform file not found: ${ref}`, {
      transform: ref,
      path: filePath,
    });
  }
  return filePath;
}

/**
 * Load the text of a named or path-based transform
 */
export async function loadTransformSource(
  ref: string,
  options: LocateOptions = {},
): Promise<TransformSource> {
  const path = resolveTransformPath(ref, options);

  try {
    const text = await readFile(path, "utf-8");
    log.info("Loaded transform", { transform: ref, path });
    return { text, path };
  } catch (error) {
    throw new InputReadError(`Failed to read transform ${ref} from ${path}`, { path }, {
      cause: error,
    });
  }
}
