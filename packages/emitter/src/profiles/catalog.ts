/**
 * Target catalog - identifiers, file extensions and comment tokens
 */

export const TARGET_IDS = [
  "python",
  "javascript",
  "typescript",
  "java",
  "c",
  "cpp",
  "csharp",
  "go",
  "rust",
  "php",
  "ruby",
  "swift",
  "kotlin",
  "dart",
  "scala",
  "perl",
  "lua",
  "r",
  "julia",
  "powershell",
] as const;

export type TargetId = (typeof TARGET_IDS)[number];

export type CatalogEntry = {
  readonly id: TargetId;
  /** Display name */
  readonly name: string;
  /** Output file extension, including the dot */
  readonly extension: string;
  /** Line comment token, used for generated file headers */
  readonly comment: string;
  /** Alternative identifiers accepted on the command line */
  readonly aliases: readonly string[];
};

export const TARGET_CATALOG: readonly CatalogEntry[] = [
  { id: "python", name: "Python", extension: ".py", comment: "#", aliases: ["py"] },
  { id: "javascript", name: "JavaScript", extension: ".js", comment: "//", aliases: ["js"] },
  { id: "typescript", name: "TypeScript", extension: ".ts", comment: "//", aliases: ["ts"] },
  { id: "java", name: "Java", extension: ".java", comment: "//", aliases: [] },
  { id: "c", name: "C", extension: ".c", comment: "//", aliases: [] },
  { id: "cpp", name: "C++", extension: ".cpp", comment: "//", aliases: ["c++"] },
  { id: "csharp", name: "C#", extension: ".cs", comment: "//", aliases: ["c#", "cs"] },
  { id: "go", name: "Go", extension: ".go", comment: "//", aliases: ["golang"] },
  { id: "rust", name: "Rust", extension: ".rs", comment: "//", aliases: ["rs"] },
  { id: "php", name: "PHP", extension: ".php", comment: "//", aliases: [] },
  { id: "ruby", name: "Ruby", extension: ".rb", comment: "#", aliases: ["rb"] },
  { id: "swift", name: "Swift", extension: ".swift", comment: "//", aliases: [] },
  { id: "kotlin", name: "Kotlin", extension: ".kt", comment: "//", aliases: ["kt"] },
  { id: "dart", name: "Dart", extension: ".dart", comment: "//", aliases: [] },
  { id: "scala", name: "Scala", extension: ".scala", comment: "//", aliases: [] },
  { id: "perl", name: "Perl", extension: ".pl", comment: "#", aliases: ["pl"] },
  { id: "lua", name: "Lua", extension: ".lua", comment: "--", aliases: [] },
  { id: "r", name: "R", extension: ".R", comment: "#", aliases: [] },
  { id: "julia", name: "Julia", extension: ".jl", comment: "#", aliases: ["jl"] },
  { id: "powershell", name: "PowerShell", extension: ".ps1", comment: "#", aliases: ["ps1", "pwsh"] },
];

/**
 * Look up a catalog entry by identifier or alias, ignoring case
 */
export const findCatalogEntry = (target: string): CatalogEntry | undefined => {
  const key = target.trim().toLowerCase();
  return TARGET_CATALOG.find(
    (entry) =>
      entry.id === key ||
      entry.name.toLowerCase() === key ||
      entry.aliases.includes(key)
  );
};
