/**
 * Loading emission configurations from JSON files.
 *
 * Configuration files live under `configs/emissions/` at the repository root.
 */

import { existsSync, readFileSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import { fileURLToPath } from "node:url";

import { ValidationError } from "../errors.js";
import { InventoryConfig, type InventoryConfigOptions } from "./inventory-config.js";

const moduleDir = dirname(fileURLToPath(import.meta.url));

export const EXAMPLE_CONFIG_FILE = "example.json";

/**
 * Walk up directories to find `configs/emissions/`.
 * Works from both source (packages/inventory/src/) and compiled (dist/) paths.
 */
export function findConfigsRoot(): string {
  let dir = moduleDir;
  for (let i = 0; i < 10; i++) {
    const candidate = join(dir, "configs", "emissions");
    if (existsSync(candidate)) {
      return candidate;
    }
    const parent = dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  // moduleDir is packages/inventory/src/config or packages/inventory/dist/config
  return join(resolve(moduleDir, "..", "..", "..", ".."), "configs", "emissions");
}

/** Read, validate and assemble a JSON configuration file */
export function loadInventoryConfig(
  filePath: string,
  options: InventoryConfigOptions = {},
): InventoryConfig {
  const text = readFileSync(filePath, "utf-8");
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ValidationError(`${filePath} is not valid JSON`, [
      err instanceof Error ? err.message : String(err),
    ]);
  }
  const config = InventoryConfig.fromRaw(raw, options);
  console.log(`[config] Loaded emission configuration from ${filePath}`);
  return config;
}

/** The example configuration shipped with the repository */
export function loadExampleConfig(options: InventoryConfigOptions = {}): InventoryConfig {
  return loadInventoryConfig(join(findConfigsRoot(), EXAMPLE_CONFIG_FILE), options);
}
