import fs from "fs";
import path from "path";
import YAML from "yaml";
import { ConfigValidationError, ConfigurationError } from "../core/errors";
import { formatIssues, validateConfigSafe, type NaclModuleConfig } from "../types/schemas";

export const DEFAULT_CONFIG_FILE = "nacl.yaml";
const SAMPLE_CONFIG = path.join("examples", "basic", "nacl.yaml");

/** Nearest directory at or above `start` holding a package.json. */
export function findPackageRoot(start: string): string {
  let dir = path.resolve(start);
  while (!fs.existsSync(path.join(dir, "package.json"))) {
    const parent = path.dirname(dir);
    if (parent === dir) {
      throw new ConfigurationError(start, "no package.json found in this directory or above it");
    }
    dir = parent;
  }
  return dir;
}

// Works from the sources and from the compiled dist/src tree alike.
export function sampleConfigPath(start: string = __dirname): string {
  return path.join(findPackageRoot(start), SAMPLE_CONFIG);
}

export function resolveConfigPath(configPath?: string, cwd: string = process.cwd()): string {
  return path.resolve(cwd, configPath || DEFAULT_CONFIG_FILE);
}

export function parseConfigText(raw: string, fileName: string): unknown {
  try {
    return fileName.endsWith(".json") ? JSON.parse(raw) : YAML.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(fileName, `cannot be parsed: ${reason}`);
  }
}

export function parseConfig(data: unknown): NaclModuleConfig {
  const result = validateConfigSafe(data);
  if (!result.success) {
    throw new ConfigValidationError(formatIssues(result.error));
  }
  return result.data;
}

export function readConfigFile(configPath: string): NaclModuleConfig {
  if (!fs.existsSync(configPath)) {
    throw new ConfigurationError(configPath, "config file not found");
  }
  const raw = fs.readFileSync(configPath, "utf8");
  return parseConfig(parseConfigText(raw, configPath));
}
