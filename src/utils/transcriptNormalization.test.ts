import { describe, it } from "node:test";
import assert from "node:assert/strict";
import {
  correctKnownTerms,
  normalizeCitySequence,
  normalizeSpelling,
  normalizeTranscript,
} from "./transcriptNormalization.js";

describe("normalizeSpelling", () => {
  it("turns a phonetic spelling run into an acronym", () => {
    assert.equal(
      normalizeSpelling("UPS A come Ancona P come Padova C come Como Smart 3000"),
      "UPS APC Smart 3000"
    );
  });

  it("accepts punctuation between spelled letters", () => {
    assert.equal(normalizeSpelling("A come Ancona, P come Padova"), "AP");
  });

  it("leaves ordinary uses of come untouched", () => {
    assert.equal(normalizeSpelling("come sta il paziente"), "come sta il paziente");
  });

  it("keeps separate spelling runs apart", () => {
    assert.equal(
      normalizeSpelling("modello A come Ancona seriale B come Bari"),
      "modello A seriale B"
    );
  });
});

describe("normalizeCitySequence", () => {
  it("converts two or more consecutive cities", () => {
    assert.equal(normalizeCitySequence("marca Ancona Padova Como"), "marca APC");
  });

  it("keeps a single city", () => {
    assert.equal(normalizeCitySequence("sede di Roma"), "sede di Roma");
  });
});

describe("correctKnownTerms", () => {
  it("fixes mis-recognised acronyms and brands as whole words", () => {
    assert.equal(correctKnownTerms("gruppo di continuità UBS Phillips"), "gruppo di continuità UPS Philips");
    assert.equal(correctKnownTerms("bombola o 2"), "bombola O2");
  });

  it("does not touch words that merely contain a known term", () => {
    assert.equal(correctKnownTerms("ABCD"), "ABCD");
  });
});

describe("normalizeTranscript", () => {
  it("applies every step and collapses whitespace", () => {
    assert.equal(normalizeTranscript("  ups   A come Ancona P come Padova C come Como  "), "ups APC");
  });

  it("returns an empty string for blank input", () => {
    assert.equal(normalizeTranscript("   "), "");
  });
});
