import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { APICallError, NoObjectGeneratedError, TypeValidationError } from "ai";
import { classifyExtractionError } from "./extractionClient.js";
import { ExtractionError } from "../../utils/errors.js";

function apiError(statusCode: number): APICallError {
  return new APICallError({
    message: `HTTP ${statusCode}`,
    url: "https://model.test/v1/responses",
    requestBodyValues: {},
    statusCode,
  });
}

function noObject(finishReason: "stop" | "content-filter"): NoObjectGeneratedError {
  return new NoObjectGeneratedError({
    message: "No object generated.",
    response: { id: "resp-1", timestamp: new Date(0), modelId: "test-model" },
    usage: { inputTokens: 10, outputTokens: 0, totalTokens: 10 },
    finishReason,
  });
}

describe("classifyExtractionError", () => {
  it("maps HTTP 429 to a retryable rate limit", () => {
    const error = classifyExtractionError(apiError(429));
    assert.equal(error.kind, "rate-limited");
    assert.equal(error.retryable, true);
  });

  it("keeps the SDK's retry verdict for other HTTP failures", () => {
    assert.equal(classifyExtractionError(apiError(503)).retryable, true);

    const badRequest = classifyExtractionError(apiError(400));
    assert.equal(badRequest.kind, "network");
    assert.equal(badRequest.retryable, false);
  });

  it("maps a content filter stop to a non-retryable error", () => {
    const error = classifyExtractionError(noObject("content-filter"));
    assert.equal(error.kind, "content-filtered");
    assert.equal(error.retryable, false);
  });

  it("treats missing or invalid objects as malformed responses", () => {
    assert.equal(classifyExtractionError(noObject("stop")).kind, "malformed-response");

    const invalid = classifyExtractionError(new TypeValidationError({ value: { reply: 1 }, cause: new Error("bad") }));
    assert.equal(invalid.kind, "malformed-response");
    assert.equal(invalid.retryable, true);
  });

  it("passes pipeline errors through and treats anything else as network", () => {
    const original = new ExtractionError("invalid-input", "empty input");
    assert.equal(classifyExtractionError(original), original);

    const unknown = classifyExtractionError(new TypeError("fetch failed"));
    assert.equal(unknown.kind, "network");
    assert.equal(unknown.message, "Model request failed: fetch failed");
    assert.equal(unknown.retryable, true);
  });
});
