export interface JobApplication {
  readonly company: string;
  readonly position: string;
  readonly dateApplied: string; // ISO date (YYYY-MM-DD)
  readonly sourceMessageId: string;
  readonly confidence: number; // 0..1
  readonly source?: string; // sender domain, usually the ATS
  readonly notes?: string;
}

export type EmailHeaders = Partial<
  Record<"from" | "to" | "subject" | "date", string>
>;

export interface RawEmail {
  id: string;
  headers: EmailHeaders;
  body: string; // plain text or HTML, not yet normalized
}

export interface EmailContext {
  id: string;
  from: string;
  subject: string;
  date: string; // raw Date header
  body: string;
}

export type EmailClassification = "rejection" | "incomplete" | "candidate";

export interface ExtractionCandidate<T> {
  value: T;
  confidence: number;
}

export type ParseResult =
  | { status: "parsed"; application: JobApplication }
  | { status: "filtered"; reason: Exclude<EmailClassification, "candidate"> }
  | { status: "unresolved" };

export interface LlmExtraction {
  company: string | null;
  position: string | null;
}

export interface MailSource {
  fetchRecentEmails(): Promise<RawEmail[]>;
  trashEmail(id: string): Promise<void>;
}

export interface ApplicationSink {
  appendApplications(applications: JobApplication[]): Promise<number>;
}

export interface RecentApplication {
  company: string;
  position: string;
  dateApplied: string;
  confidence: number;
  processedAt: string;
}

export interface RunStats {
  fetched: number;
  skipped: number; // already processed in an earlier run
  parsed: number;
  filtered: number;
  duplicates: number;
  lowConfidence: number;
  added: number;
  deleted: number;
  errors: number;
}
