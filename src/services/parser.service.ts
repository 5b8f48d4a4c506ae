import {
  EmailContext,
  ExtractionCandidate,
  JobApplication,
  LlmExtraction,
  ParseResult,
  RawEmail,
} from "../types";
import { normalizeEmailText } from "../utils/html";
import { logger } from "../utils/logger";
import { classifyEmail } from "./classifier.service";
import {
  extractCompany,
  extractDate,
  extractPosition,
  extractSource,
  FALLBACK_DATE_CONFIDENCE,
  formatIsoDate,
} from "./extraction.service";
import { LlmExtractor } from "./llm.service";

export const LLM_CONFIDENCE = 0.9;
export const DEFAULT_POSITION = "N/A";
export const DEFAULT_POSITION_CONFIDENCE = 0.5;

const MAX_NOTES_SUBJECT_CHARS = 100;

export interface ParseOptions {
  /** Omit or pass null to run on regex strategies alone. */
  llm?: Pick<LlmExtractor, "extract"> | null;
  now?: () => Date;
}

export function toEmailContext(email: RawEmail): EmailContext {
  return {
    id: email.id,
    from: email.headers.from ?? "",
    subject: email.headers.subject ?? "",
    date: email.headers.date ?? "",
    body: email.body,
  };
}

interface MergedFields {
  company: ExtractionCandidate<string> | null;
  position: ExtractionCandidate<string>;
}

/**
 * LLM value first, then the regex value. Position falls back to
 * "N/A"; company stays null and the caller drops the email.
 */
export function mergeFields(
  llm: LlmExtraction | null,
  regex: {
    company: ExtractionCandidate<string> | null;
    position: ExtractionCandidate<string> | null;
  }
): MergedFields {
  const fromLlm = (value: string | null | undefined) =>
    value ? { value, confidence: LLM_CONFIDENCE } : null;

  const defaultPosition = {
    value: DEFAULT_POSITION,
    confidence: DEFAULT_POSITION_CONFIDENCE,
  };

  return {
    company: fromLlm(llm?.company) ?? regex.company,
    position: fromLlm(llm?.position) ?? regex.position ?? defaultPosition,
  };
}

export function overallConfidence(...confidences: number[]): number {
  const mean =
    confidences.reduce((sum, value) => sum + value, 0) / confidences.length;
  return Math.round(mean * 100) / 100;
}

export function buildNotes(subject: string): string | undefined {
  return subject
    ? `Subject: ${subject.slice(0, MAX_NOTES_SUBJECT_CHARS)}`
    : undefined;
}

/**
 * Run one extractor; a thrown error counts as "nothing found".
 */
function attempt<T>(field: string, fallback: T, run: () => T): T {
  try {
    return run();
  } catch (error) {
    logger.warn(`${field} extraction failed, continuing without it`, error);
    return fallback;
  }
}

/**
 * Turn one email into a job application record. Rejections and
 * half-finished applications are filtered out; an email whose company
 * cannot be found is unresolved. Never throws.
 */
export async function parseEmail(
  email: EmailContext,
  options: ParseOptions = {}
): Promise<ParseResult> {
  const now = options.now ?? (() => new Date());
  const subjectPreview = email.subject.slice(0, 50);
  logger.debug(`Parsing email ${email.id}: ${subjectPreview}...`);

  const text = attempt("Body", "", () => normalizeEmailText(email.body));

  const classification = classifyEmail(text, email.subject);
  if (classification !== "candidate") {
    logger.info(`Skipping ${classification} email: ${subjectPreview}...`);
    return { status: "filtered", reason: classification };
  }

  const regexCompany = attempt("Company", null, () =>
    extractCompany({ text, subject: email.subject, from: email.from })
  );
  const regexPosition = attempt("Position", null, () =>
    extractPosition(text, email.subject)
  );
  const today = now();
  const date = attempt(
    "Date",
    { value: formatIsoDate(today), confidence: FALLBACK_DATE_CONFIDENCE },
    () => extractDate(text, email.date, today)
  );
  const source = attempt("Source", null, () => extractSource(email.from));

  let llmResult: LlmExtraction | null = null;
  if (options.llm) {
    try {
      llmResult = await options.llm.extract({
        text,
        subject: email.subject,
        from: email.from,
      });
    } catch (error) {
      logger.warn("LLM extraction failed", error);
    }
  }

  const { company, position } = mergeFields(llmResult, {
    company: regexCompany,
    position: regexPosition,
  });

  if (!company) {
    logger.warn(`Could not extract company from email ${email.id}`);
    return { status: "unresolved" };
  }

  const notes = buildNotes(email.subject);

  const application: JobApplication = Object.freeze({
    company: company.value,
    position: position.value,
    dateApplied: date.value,
    sourceMessageId: email.id,
    confidence: overallConfidence(
      company.confidence,
      position.confidence,
      date.confidence
    ),
    ...(source ? { source } : {}),
    ...(notes ? { notes } : {}),
  });

  logger.info(
    `Parsed application: ${application.company} - ${application.position} (confidence: ${application.confidence})`
  );
  return { status: "parsed", application };
}
