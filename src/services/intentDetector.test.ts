import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { detectIntent } from "./intentDetector.js";

describe("detectIntent", () => {
  it("recognises proceed phrases", () => {
    assert.equal(detectIntent("Basta così."), "proceed");
    assert.equal(detectIntent("ok salva"), "proceed");
    assert.equal(detectIntent("That's all"), "proceed");
  });

  it("recognises cancel phrases and lets them win", () => {
    assert.equal(detectIntent("Annulla"), "cancel");
    assert.equal(detectIntent("ok lascia perdere"), "cancel");
    assert.equal(detectIntent("never mind"), "cancel");
  });

  it("matches whole words only", () => {
    // "no" and "ok" inside other words must not trigger
    assert.equal(detectIntent("nota"), "continue");
    assert.equal(detectIntent("okay"), "continue");
  });

  it("treats long utterances as dictation", () => {
    assert.equal(detectIntent("ok the pump was repaired by Medika yesterday"), "continue");
    assert.equal(detectIntent("ok the pump was repaired", 10), "proceed");
  });

  it("continues on blank input", () => {
    assert.equal(detectIntent("  "), "continue");
  });
});
