import assert from "node:assert/strict";
import { afterEach, beforeEach, describe, it } from "node:test";
import { processNewEmails, PipelineDeps } from "../src/scheduler";
import { DedupeStore } from "../src/services/dedupe.service";
import { ApplicationSink, JobApplication, MailSource, RawEmail } from "../src/types";

class FakeMailSource implements MailSource {
  readonly trashed: string[] = [];

  constructor(
    private readonly emails: RawEmail[],
    private readonly failTrash: string[] = []
  ) {}

  async fetchRecentEmails(): Promise<RawEmail[]> {
    return this.emails;
  }

  async trashEmail(id: string): Promise<void> {
    if (this.failTrash.includes(id)) throw new Error(`cannot trash ${id}`);
    this.trashed.push(id);
  }
}

class FakeSink implements ApplicationSink {
  readonly batches: JobApplication[][] = [];

  constructor(private readonly fail = false) {}

  async appendApplications(applications: JobApplication[]): Promise<number> {
    if (this.fail) throw new Error("sheet unavailable");
    this.batches.push(applications);
    return applications.length;
  }
}

const ACME_FROM = '"Acme Corp" via Greenhouse <no-reply@greenhouse.io>';
const ACME_SUBJECT = "Thank you for applying to Acme Corp";

const email = (id: string, from: string, subject: string, body: string): RawEmail => ({
  id,
  headers: { from, subject },
  body,
});

const confirmation = email(
  "m1",
  ACME_FROM,
  ACME_SUBJECT,
  "We received your application for the Software Engineer Intern role on 2024-03-15."
);

const inbox: RawEmail[] = [
  email("m0", ACME_FROM, ACME_SUBJECT, "Already handled in an earlier run."),
  confirmation,
  email(
    "m2",
    ACME_FROM,
    "Application received",
    "We regret to inform you that we will not be moving forward."
  ),
  email("m3", "notifications@jobs.lever.co", "New message", "You have a new message."),
  email(
    "m4",
    ACME_FROM,
    ACME_SUBJECT,
    "Your application for the Software Engineer Intern role was received on 2024-03-16."
  ),
  email(
    "m5",
    "Initech Careers <jobs@initech.com>",
    "",
    "Thanks for applying! Our team will be in touch."
  ),
];

describe("processNewEmails", () => {
  let store: DedupeStore;

  beforeEach(() => {
    store = new DedupeStore(":memory:");
    store.markProcessed("m0", {
      company: "Acme Corp",
      position: "Data Analyst",
      dateApplied: "2024-01-01",
      sourceMessageId: "m0",
      confidence: 0.8,
    });
  });

  afterEach(() => {
    store.close();
  });

  const deps = (overrides: Partial<PipelineDeps>): PipelineDeps => ({
    mailSource: new FakeMailSource(inbox),
    sink: new FakeSink(),
    store,
    llm: null,
    confidenceThreshold: 0.6,
    deleteAfterSync: true,
    now: () => new Date(2024, 2, 20, 12),
    ...overrides,
  });

  it("writes new applications and counts every outcome", async () => {
    const mailSource = new FakeMailSource(inbox);
    const sink = new FakeSink();

    const stats = await processNewEmails(deps({ mailSource, sink }));

    assert.deepEqual(stats, {
      fetched: 6,
      skipped: 1,
      parsed: 3,
      filtered: 1,
      duplicates: 1,
      lowConfidence: 1,
      added: 1,
      deleted: 1,
      errors: 1,
    });
    assert.equal(sink.batches.length, 1);
    assert.deepEqual(
      sink.batches[0].map((app) => [app.company, app.position, app.dateApplied]),
      [["Acme Corp", "Software Engineer Intern", "2024-03-15"]]
    );
    assert.deepEqual(mailSource.trashed, ["m1"]);
  });

  it("marks parsed emails processed but leaves filtered and unresolved ones", async () => {
    await processNewEmails(deps({}));

    assert.equal(store.isProcessed("m1"), true);
    assert.equal(store.isProcessed("m4"), true);
    assert.equal(store.isProcessed("m5"), true);
    assert.equal(store.isProcessed("m2"), false);
    assert.equal(store.isProcessed("m3"), false);
  });

  it("skips everything on a second run", async () => {
    await processNewEmails(deps({}));
    const sink = new FakeSink();

    const stats = await processNewEmails(deps({ sink }));

    assert.equal(stats.skipped, 4);
    assert.equal(stats.added, 0);
    assert.equal(sink.batches.length, 0);
  });

  it("keeps emails when deleteAfterSync is off", async () => {
    const mailSource = new FakeMailSource([confirmation]);

    const stats = await processNewEmails(deps({ mailSource, deleteAfterSync: false }));

    assert.equal(stats.added, 1);
    assert.equal(stats.deleted, 0);
    assert.deepEqual(mailSource.trashed, []);
  });

  it("does not delete anything when the sink fails", async () => {
    const mailSource = new FakeMailSource([confirmation]);

    await assert.rejects(
      processNewEmails(deps({ mailSource, sink: new FakeSink(true) })),
      /sheet unavailable/
    );
    assert.deepEqual(mailSource.trashed, []);
  });

  it("keeps going when one email cannot be trashed", async () => {
    const second = email(
      "m6",
      "Globex Careers <careers@globex.com>",
      "Application received",
      "Thanks for applying for the Data Analyst position on 2024-03-18."
    );
    const mailSource = new FakeMailSource([confirmation, second], ["m1"]);

    const stats = await processNewEmails(deps({ mailSource }));

    assert.equal(stats.added, 2);
    assert.equal(stats.deleted, 1);
    assert.deepEqual(mailSource.trashed, ["m6"]);
  });

  it("propagates fetch failures", async () => {
    const mailSource: MailSource = {
      fetchRecentEmails: async () => {
        throw new Error("gmail down");
      },
      trashEmail: async () => undefined,
    };

    await assert.rejects(processNewEmails(deps({ mailSource })), /gmail down/);
  });
});
