import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { combineSpeakerHints, inferSpeaker } from "./speakerInference.js";

describe("inferSpeaker", () => {
  it("detects first-person work reports", () => {
    assert.equal(inferSpeaker("Ho sostituito il filtro della pompa"), "likely-performer");
    assert.equal(inferSpeaker("Sono di Tecnomed, ho appena finito"), "likely-performer");
    assert.equal(inferSpeaker("I replaced the battery"), "likely-performer");
  });

  it("detects third-person reports", () => {
    assert.equal(inferSpeaker("Il tecnico ha riparato il letto"), "likely-operator");
    assert.equal(inferSpeaker("È venuto quello della Medika"), "likely-operator");
    assert.equal(inferSpeaker("They fixed the monitor"), "likely-operator");
  });

  it("is inconclusive without evidence", () => {
    assert.equal(inferSpeaker("Sostituzione batteria del monitor"), "unknown");
  });
});

describe("combineSpeakerHints", () => {
  it("keeps the current hint when the new one is inconclusive", () => {
    assert.equal(combineSpeakerHints("likely-performer", "unknown"), "likely-performer");
  });

  it("lets the newest conclusive hint win", () => {
    assert.equal(combineSpeakerHints("likely-performer", "likely-operator"), "likely-operator");
    assert.equal(combineSpeakerHints("unknown", "likely-performer"), "likely-performer");
  });
});
