import assert from "node:assert/strict";
import { describe, it } from "node:test";
import type { gmail_v1 } from "googleapis";
import { getEmailBody, getEmailHeaders } from "../src/services/gmail.service";

const encode = (text: string) => Buffer.from(text, "utf-8").toString("base64url");

describe("getEmailHeaders", () => {
  it("keeps from, to, subject and date, case-insensitively", () => {
    const payload: gmail_v1.Schema$MessagePart = {
      headers: [
        { name: "From", value: "jobs@acme.com" },
        { name: "Subject", value: "Application received" },
        { name: "X-Mailer", value: "ignored" },
        { name: "DATE", value: "Fri, 15 Mar 2024 10:00:00 +0000" },
      ],
    };

    assert.deepEqual(getEmailHeaders(payload), {
      from: "jobs@acme.com",
      subject: "Application received",
      date: "Fri, 15 Mar 2024 10:00:00 +0000",
    });
  });

  it("returns no headers for a missing payload", () => {
    assert.deepEqual(getEmailHeaders(undefined), {});
  });
});

describe("getEmailBody", () => {
  it("prefers text/plain over text/html", () => {
    const payload: gmail_v1.Schema$MessagePart = {
      mimeType: "multipart/alternative",
      parts: [
        { mimeType: "text/html", body: { data: encode("<b>html body</b>") } },
        { mimeType: "text/plain", body: { data: encode("plain body") } },
      ],
    };

    assert.equal(getEmailBody(payload), "plain body");
  });

  it("looks one level into nested parts", () => {
    const payload: gmail_v1.Schema$MessagePart = {
      mimeType: "multipart/mixed",
      parts: [
        {
          mimeType: "multipart/alternative",
          parts: [{ mimeType: "text/html", body: { data: encode("<b>hi</b>") } }],
        },
      ],
    };

    assert.equal(getEmailBody(payload), "<b>hi</b>");
  });

  it("does not look deeper than one nested level", () => {
    const payload: gmail_v1.Schema$MessagePart = {
      parts: [
        {
          parts: [
            { parts: [{ mimeType: "text/plain", body: { data: encode("deep") } }] },
          ],
        },
      ],
    };

    assert.equal(getEmailBody(payload), "");
  });

  it("uses the top-level body of a single-part message", () => {
    const payload: gmail_v1.Schema$MessagePart = {
      mimeType: "text/plain",
      body: { data: encode("Thanks for applying, café team") },
    };

    assert.equal(getEmailBody(payload), "Thanks for applying, café team");
  });

  it("returns an empty string without a payload", () => {
    assert.equal(getEmailBody(undefined), "");
  });
});
