/**
 * TypeScript - JavaScript with annotated parameters
 */

import type { LanguageProfile } from "../types.js";
import { javascriptProfile } from "./javascript.js";

export const typescriptProfile: LanguageProfile = {
  ...javascriptProfile,
  id: "typescript",
  functions: {
    ...javascriptProfile.functions,
    parameter: "{name}: any",
  },
  classes: {
    ...javascriptProfile.classes,
    field: "static {name}: any = {value}",
  },
};
