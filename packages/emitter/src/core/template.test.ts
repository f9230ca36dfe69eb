/**
 * Tests for profile template rendering
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { isAtomShaped, renderStatement, renderTemplate } from "./template.js";
import { atom, PRECEDENCE } from "../expressions/parentheses.js";

const sum = { text: "a + b", precedence: PRECEDENCE.additive };

describe("Template rendering", () => {
  it("should fill slots with fragments and raw text", () => {
    const result = renderTemplate("{value}.{attr}", {
      value: atom("xs"),
      attr: "length",
    });

    expect(result.text).to.equal("xs.length");
    expect(result.precedence).to.equal(PRECEDENCE.atom);
  });

  it("should parenthesize a loose fragment before member access", () => {
    expect(renderTemplate("{0}.length", { "0": sum }).text).to.equal(
      "(a + b).length"
    );
  });

  it("should never wrap raw text", () => {
    expect(renderTemplate("{0}.length", { "0": "a + b" }).text).to.equal(
      "a + b.length"
    );
  });

  it("should leave slots without a value as literal text", () => {
    expect(renderTemplate("f({a}, {b})", { a: "1" }).text).to.equal(
      "f(1, {b})"
    );
  });

  it("should not rescan inserted text", () => {
    expect(renderTemplate("{a}{b}", { a: "{b}", b: "x" }).text).to.equal(
      "{b}x"
    );
  });

  it("should treat braces around non-words as literal text", () => {
    const result = renderTemplate("{ {entries} }", { entries: "a: 1" });

    expect(result.text).to.equal("{ a: 1 }");
    expect(result.precedence).to.equal(PRECEDENCE.atom);
  });

  it("should not wrap fragments delimited by brackets and commas", () => {
    const result = renderTemplate("pow({left}, {right})", {
      left: sum,
      right: atom("c"),
    });

    expect(result.text).to.equal("pow(a + b, c)");
    expect(result.precedence).to.equal(PRECEDENCE.atom);
  });

  it("should wrap a nested ternary in a ternary slot", () => {
    const result = renderTemplate("{test} ? {body} : {orelse}", {
      test: atom("a"),
      body: { text: "c ? d : e", precedence: PRECEDENCE.lowest },
      orelse: atom("f"),
    });

    expect(result.text).to.equal("a ? (c ? d : e) : f");
    expect(result.precedence).to.equal(PRECEDENCE.lowest);
  });

  it("should keep an or-level fragment bare as a ternary test", () => {
    const result = renderTemplate("{test} ? {body} : {orelse}", {
      test: { text: "a || b", precedence: PRECEDENCE.or },
      body: atom("c"),
      orelse: atom("d"),
    });

    expect(result.text).to.equal("a || b ? c : d");
  });

  it("should take a lone slot's precedence", () => {
    expect(renderTemplate("{x}", { x: sum }).precedence).to.equal(
      PRECEDENCE.additive
    );
  });

  describe("statement mode", () => {
    it("should treat keywords as delimiters", () => {
      expect(renderStatement("return {value}", { value: sum })).to.equal(
        "return a + b"
      );
    });

    it("should wrap after a keyword in expression mode", () => {
      expect(renderTemplate("return {value}", { value: sum }).text).to.equal(
        "return (a + b)"
      );
    });

    it("should treat an R-style arrow as an assignment", () => {
      expect(
        renderStatement("{target} <- {value}", { target: atom("x"), value: sum })
      ).to.equal("x <- a + b");
    });
  });

  describe("isAtomShaped", () => {
    it("should accept primaries with postfix chains", () => {
      expect(isAtomShaped("x")).to.equal(true);
      expect(isAtomShaped("f(x)")).to.equal(true);
      expect(isAtomShaped("xs.size()")).to.equal(true);
      expect(isAtomShaped("[1, 2]")).to.equal(true);
      expect(isAtomShaped("$this->x")).to.equal(true);
      expect(isAtomShaped('"x".length')).to.equal(true);
    });

    it("should reject operators and keywords", () => {
      expect(isAtomShaped("a + b")).to.equal(false);
      expect(isAtomShaped("not x")).to.equal(false);
      expect(isAtomShaped("")).to.equal(false);
    });
  });
});
