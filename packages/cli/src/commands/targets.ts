/**
 * retarget targets command - list the target catalog
 */

import { listTargets, type CatalogEntry } from "@retarget/emitter";

export const formatTargetLine = (entry: CatalogEntry): string => {
  const aliases =
    entry.aliases.length > 0 ? `  (${entry.aliases.join(", ")})` : "";
  return `${entry.id.padEnd(12)}${entry.name.padEnd(12)}${entry.extension}${aliases}`;
};

export const targetsCommand = (): readonly string[] => {
  const lines = listTargets().map(formatTargetLine);
  for (const line of lines) {
    console.log(line);
  }
  return lines;
};
