/**
 * Emitter options and defaults
 */

import { DEFAULT_INDENT, type EmitterOptions } from "../types.js";

/**
 * Default emitter options. `entryClassName` falls back to the profile's
 * default class name.
 */
export const defaultOptions: EmitterOptions = {
  indent: DEFAULT_INDENT,
};
