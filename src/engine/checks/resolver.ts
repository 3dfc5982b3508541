import * as z from "zod";
import { ConfigError } from "../../errors.js";
import type { CheckConfigEntry, CheckFactories, InvariantCheck } from "./checks.types.js";
import { builtInCheckFactories } from "./registry.js";

/**
 * Config entry for a custom check registered through a factory map.
 * Built-in entries are typed by {@link CheckConfigEntry}.
 */
export type CustomCheckConfigEntry = { name: string } & Record<string, unknown>;

/**
 * Instantiates checks from named config entries.
 *
 * Each factory validates its own config. Unknown names and malformed configs
 * are rejected with a {@link ConfigError} of kind `InvalidOptions`.
 */
export function buildChecks(
  entries: readonly (CheckConfigEntry | CustomCheckConfigEntry)[],
  factories: CheckFactories = builtInCheckFactories,
): InvariantCheck[] {
  return entries.map((entry, index) => {
    const { name, ...config } = entry;
    const factory = Object.hasOwn(factories, name) ? factories[name] : undefined;
    if (!factory) {
      throw new ConfigError("InvalidOptions", `Unknown check "${name}"`, {
        issues: [{ path: `checks.${index}.name`, message: `Unknown check "${name}"` }],
      });
    }
    try {
      return factory(config);
    } catch (error) {
      if (!(error instanceof z.ZodError)) throw error;
      const issues = error.issues.map((issue) => ({
        path: [`checks.${index}`, ...issue.path.map(String)].join("."),
        message: issue.message,
      }));
      throw new ConfigError(
        "InvalidOptions",
        `Invalid config for check "${name}": ${issues.map((i) => `${i.path}: ${i.message}`).join("; ")}`,
        { issues },
      );
    }
  });
}
