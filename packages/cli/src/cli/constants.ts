/**
 * CLI constants
 */

import { createRequire } from "node:module";

const require = createRequire(import.meta.url);
const packageJson: unknown = require("../../package.json");

const readVersion = (value: unknown): string =>
  typeof value === "object" &&
  value !== null &&
  "version" in value &&
  typeof value.version === "string"
    ? value.version
    : "0.0.0";

export const VERSION = readVersion(packageJson);

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;
export const EXIT_CONFIG = 3;
