/**
 * Version utilities
 */

import * as fs from "fs";
import * as path from "path";
import { fileURLToPath } from "url";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

/**
 * Nearest package.json above this module, from src/ or from the build output
 */
function findPackageJson(startDir: string): string | null {
  let currentDir = startDir;
  const root = path.parse(currentDir).root;

  while (currentDir !== root) {
    const potentialPath = path.join(currentDir, "package.json");
    if (fs.existsSync(potentialPath)) {
      return potentialPath;
    }
    currentDir = path.dirname(currentDir);
  }

  return null;
}

/**
 * Get the CLI version from package.json
 */
export function getVersion(): string {
  const packageJsonPath = findPackageJson(__dirname);
  if (!packageJsonPath) {
    return "0.0.0";
  }
  const packageJson: unknown = JSON.parse(fs.readFileSync(packageJsonPath, "utf8"));
  if (
    typeof packageJson === "object" &&
    packageJson !== null &&
    "version" in packageJson &&
    typeof packageJson.version === "string"
  ) {
    return packageJson.version;
  }
  return "0.0.0";
}

/**
 * The current CLI version
 */
export const VERSION = getVersion();
