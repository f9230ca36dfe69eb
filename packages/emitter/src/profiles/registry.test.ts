import { describe, it } from "mocha";
import { expect } from "chai";
import {
  listTargets,
  PROFILES,
  resolveCatalogEntry,
  resolveProfile,
} from "./registry.js";
import { findCatalogEntry, TARGET_CATALOG, TARGET_IDS } from "./catalog.js";

describe("Profile registry", () => {
  it("should hold one profile per catalog entry", () => {
    expect(TARGET_CATALOG.map((entry) => entry.id)).to.deep.equal([
      ...TARGET_IDS,
    ]);
    for (const target of TARGET_IDS) {
      expect(PROFILES[target].id).to.equal(target);
    }
    expect(listTargets()).to.have.length(20);
  });

  it("should keep aliases unique across targets", () => {
    const keys = TARGET_CATALOG.flatMap((entry) => [entry.id, ...entry.aliases]);

    expect(new Set(keys).size).to.equal(keys.length);
  });

  it("should resolve ids, aliases and display names ignoring case", () => {
    expect(findCatalogEntry("C#")?.id).to.equal("csharp");
    expect(findCatalogEntry(" pwsh ")?.id).to.equal("powershell");
    expect(findCatalogEntry("JavaScript")?.id).to.equal("javascript");
    expect(findCatalogEntry("c++")?.id).to.equal("cpp");
    expect(findCatalogEntry("pascal")).to.equal(undefined);
  });

  it("should return the profile for a known target", () => {
    const result = resolveProfile("rb");

    expect(result.ok).to.equal(true);
    if (result.ok) {
      expect(result.value.id).to.equal("ruby");
    }
  });

  it("should list known targets in the unknown target hint", () => {
    const result = resolveCatalogEntry("pascal");

    expect(result.ok).to.equal(false);
    if (!result.ok) {
      expect(result.error.code).to.equal("RTG3001");
      expect(result.error.severity).to.equal("error");
      expect(result.error.hint).to.match(/^Known targets: python, javascript, /);
    }
  });

  it("should give every extension a leading dot", () => {
    for (const entry of TARGET_CATALOG) {
      expect(entry.extension, entry.id).to.match(/^\.[A-Za-z0-9]+$/);
    }
  });
});
