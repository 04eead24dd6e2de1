import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { DEFAULT_MATCH_THRESHOLDS, resolveVoiceConfig } from "./voice.js";

describe("resolveVoiceConfig", () => {
  it("applies defaults when nothing is set", () => {
    const config = resolveVoiceConfig({});
    assert.deepEqual(config.matching, {
      minSimilarity: 0.6,
      highConfidenceSimilarity: 0.8,
      confidenceGap: 0.2,
      partialMatchWeight: 0.9,
    });
    assert.equal(config.maxExchanges, 6);
    assert.equal(config.capture.maxQuietRestarts, 3);
    assert.equal(config.capture.maxSessionMs, 0);
    assert.equal(config.extraction.model, "gpt-4o-mini");
    assert.equal(config.extraction.lowConfidenceThreshold, 0.7);
    assert.equal(config.extraction.rateLimitPerMinute, 10);
  });

  it("coerces numeric variables and ignores blank ones", () => {
    const config = resolveVoiceConfig({
      VOICE_MIN_SIMILARITY: "0.5",
      VOICE_MAX_EXCHANGES: "10",
      VOICE_EXTRACTION_MODEL: "",
    });
    assert.equal(config.matching.minSimilarity, 0.5);
    assert.equal(config.maxExchanges, 10);
    assert.equal(config.extraction.model, "gpt-4o-mini");
  });

  it("rejects out-of-range thresholds", () => {
    assert.throws(
      () => resolveVoiceConfig({ VOICE_CONFIDENCE_GAP: "1.5" }),
      /Invalid voice configuration: VOICE_CONFIDENCE_GAP/
    );
  });

  it("rejects a minimum similarity above the high-confidence threshold", () => {
    assert.throws(
      () => resolveVoiceConfig({ VOICE_MIN_SIMILARITY: "0.9" }),
      /must not exceed VOICE_HIGH_CONFIDENCE_SIMILARITY/
    );
  });

  it("exposes default matching thresholds", () => {
    assert.equal(DEFAULT_MATCH_THRESHOLDS.highConfidenceSimilarity, 0.8);
  });
});
