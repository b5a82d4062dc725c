/**
 * Loads the modules a transform lists under `require` so expressions
 * can use them as globals
 */

import { isAbsolute, basename, extname, resolve } from "path";
import { pathToFileURL } from "url";
import { CapabilityLoadError, errorMessage } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

const log = logger.child("capability");

/**
 * Global name an expression uses for a required module:
 * `date-fns` -> `dateFns`, `./lib/geo.mjs` -> `geo`, `@acme/units` -> `units`
 */
export function capabilityBindingName(name: string): string {
  const base = basename(name, extname(name));
  const words = base.split(/[^A-Za-z0-9_$]+/).filter((word) => word !== "");
  const camel = words
    .map((word, index) =>
      index === 0 ? word : word.charAt(0).toUpperCase() + word.slice(1),
    )
    .join("");
  return /^[0-9]/.test(camel) ? `_${camel}` : camel;
}

function isPathSpecifier(name: string): boolean {
  return name.startsWith(".") || isAbsolute(name);
}

/**
 * Import each required module. Paths resolve against `baseDir` (the
 * transform file's directory); other names are package specifiers.
 */
export async function loadCapabilities(
  names: readonly string[],
  baseDir: string = process.cwd(),
): Promise<Record<string, unknown>> {
  const capabilities: Record<string, unknown> = {};

  for (const name of names) {
    const bindingName = capabilityBindingName(name);
    if (bindingName === "") {
      throw new CapabilityLoadError(name, "no usable binding name");
    }

    const specifier = isPathSpecifier(name)
      ? pathToFileURL(resolve(baseDir, name)).href
      : name;

    let loaded: unknown;
    try {
      loaded = await import(specifier);
    } catch (error) {
      throw new CapabilityLoadError(name, errorMessage(error), { cause: error });
    }

    capabilities[bindingName] =
      typeof loaded === "object" &&
      loaded !== null &&
      "default" in loaded &&
      loaded.default !== undefined
        ? loaded.default
        : loaded;

    log.debug("Loaded transform capability", { name, bindingName });
  }

  return capabilities;
}
