import assert from "node:assert/strict";
import { describe, it } from "node:test";
import {
  classifyEmail,
  INCOMPLETE_INDICATORS,
  isIncompleteApplication,
  isRejectionEmail,
  REJECTION_INDICATORS,
} from "../src/services/classifier.service";

describe("classifyEmail", () => {
  it("filters rejections even when the subject looks like a confirmation", () => {
    const result = classifyEmail(
      "We regret to inform you that we will not be moving forward",
      "Application received"
    );

    assert.equal(result, "rejection");
  });

  it("filters every rejection phrase regardless of confirmation wording", () => {
    for (const phrase of REJECTION_INDICATORS) {
      assert.equal(
        classifyEmail(`Thank you for applying! ${phrase}.`, "Application received"),
        "rejection",
        phrase
      );
    }
  });

  it("checks rejection before incomplete", () => {
    const result = classifyEmail(
      "Your application was incomplete and unfortunately, we have decided to close it.",
      "Update"
    );

    assert.equal(result, "rejection");
  });

  it("filters started-but-not-submitted applications", () => {
    const result = classifyEmail(
      "Thanks for starting your application at Acme. Pick up where you left off.",
      "Your Acme application"
    );

    assert.equal(result, "incomplete");
  });

  it("looks at the subject as well as the body", () => {
    assert.equal(classifyEmail("Hello", "You were NOT SELECTED"), "rejection");
  });

  it("lets confirmations through", () => {
    const result = classifyEmail(
      "Thank you for applying to Acme Corp. We received your application.",
      "Application received"
    );

    assert.equal(result, "candidate");
  });
});

describe("indicator helpers", () => {
  it("match case-insensitively", () => {
    assert.equal(isRejectionEmail("We REGRET TO INFORM you", ""), true);
    assert.equal(isIncompleteApplication("", "Draft Application saved"), true);
    assert.equal(isRejectionEmail("Thanks for applying", "Received"), false);
  });

  it("store phrases in lower case so they can match the lowered text", () => {
    for (const phrase of [...REJECTION_INDICATORS, ...INCOMPLETE_INDICATORS]) {
      assert.equal(phrase, phrase.toLowerCase());
    }
  });
});
