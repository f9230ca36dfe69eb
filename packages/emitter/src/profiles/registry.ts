/**
 * Profile registry - one profile per catalog entry
 */

import {
  createDiagnostic,
  error,
  ok,
  type Diagnostic,
  type Result,
} from "@retarget/frontend";
import {
  findCatalogEntry,
  TARGET_CATALOG,
  type CatalogEntry,
  type TargetId,
} from "./catalog.js";
import type { LanguageProfile } from "./types.js";
import { cProfile } from "./targets/c.js";
import { cppProfile } from "./targets/cpp.js";
import { csharpProfile } from "./targets/csharp.js";
import { dartProfile } from "./targets/dart.js";
import { goProfile } from "./targets/go.js";
import { javaProfile } from "./targets/java.js";
import { javascriptProfile } from "./targets/javascript.js";
import { juliaProfile } from "./targets/julia.js";
import { kotlinProfile } from "./targets/kotlin.js";
import { luaProfile } from "./targets/lua.js";
import { perlProfile } from "./targets/perl.js";
import { phpProfile } from "./targets/php.js";
import { powershellProfile } from "./targets/powershell.js";
import { pythonProfile } from "./targets/python.js";
import { rProfile } from "./targets/r.js";
import { rubyProfile } from "./targets/ruby.js";
import { rustProfile } from "./targets/rust.js";
import { scalaProfile } from "./targets/scala.js";
import { swiftProfile } from "./targets/swift.js";
import { typescriptProfile } from "./targets/typescript.js";

/**
 * Keyed by catalog id; the record type makes a missing target a compile error.
 */
export const PROFILES: Readonly<Record<TargetId, LanguageProfile>> = {
  python: pythonProfile,
  javascript: javascriptProfile,
  typescript: typescriptProfile,
  java: javaProfile,
  c: cProfile,
  cpp: cppProfile,
  csharp: csharpProfile,
  go: goProfile,
  rust: rustProfile,
  php: phpProfile,
  ruby: rubyProfile,
  swift: swiftProfile,
  kotlin: kotlinProfile,
  dart: dartProfile,
  scala: scalaProfile,
  perl: perlProfile,
  lua: luaProfile,
  r: rProfile,
  julia: juliaProfile,
  powershell: powershellProfile,
};

export const unknownTargetDiagnostic = (target: string): Diagnostic =>
  createDiagnostic(
    "RTG3001",
    "error",
    `Unknown target language '${target}'`,
    undefined,
    `Known targets: ${TARGET_CATALOG.map((entry) => entry.id).join(", ")}`
  );

/**
 * Resolve a target identifier or alias to its profile
 */
export const resolveProfile = (
  target: string
): Result<LanguageProfile, Diagnostic> => {
  const entry = findCatalogEntry(target);
  return entry
    ? ok(PROFILES[entry.id])
    : error(unknownTargetDiagnostic(target));
};

/**
 * Resolve a target identifier or alias to its catalog entry
 */
export const resolveCatalogEntry = (
  target: string
): Result<CatalogEntry, Diagnostic> => {
  const entry = findCatalogEntry(target);
  return entry ? ok(entry) : error(unknownTargetDiagnostic(target));
};

export const listTargets = (): readonly CatalogEntry[] => TARGET_CATALOG;
