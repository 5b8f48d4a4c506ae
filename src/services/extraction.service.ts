import dayjs from "dayjs";
import customParseFormat from "dayjs/plugin/customParseFormat";
import utc from "dayjs/plugin/utc";
import jobTitles from "../data/job-titles.json";
import { ExtractionCandidate } from "../types";

dayjs.extend(customParseFormat);
dayjs.extend(utc);

export const REGEX_COMPANY_CONFIDENCE = 0.7;
export const REGEX_POSITION_CONFIDENCE = 0.8;
export const BODY_DATE_CONFIDENCE = 0.8;
export const HEADER_DATE_CONFIDENCE = 0.6;
export const FALLBACK_DATE_CONFIDENCE = 0.3;

const MAX_COMPANY_LENGTH = 49;

const escapeRegExp = (value: string) =>
  value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

const withinLength = (value: string) =>
  value.length > 1 && value.length <= MAX_COMPANY_LENGTH;

// ---- Company extraction ----

export interface CompanyInput {
  text: string;
  subject: string;
  from: string;
}

type CompanyStrategy = (input: CompanyInput) => string | null;

// "Acme" via Greenhouse <...>, Acme Careers <...>
const SENDER_COMPANY_PATTERNS = [
  /"([^"]+)" via .+/i,
  /([A-Za-z0-9\s&.]+)\s+Careers?\s*</i,
  /([A-Za-z0-9\s&.]+)\s+Recruiting\s*</i,
  /([A-Za-z0-9\s&.]+)\s+Talent\s*</i,
  /([A-Za-z0-9\s&.]+)\s+Jobs?\s*</i,
  /([A-Za-z0-9\s&.]+)\s+HR\s*</i,
];

// Case-sensitive: the capture has to start with a capital letter
const PHRASE_COMPANY_PATTERNS = [
  /(?:applying|applied|application)\s+(?:to|at|for(?:\s+a\s+position\s+at)?)\s+([A-Z][A-Za-z0-9\s&.'-]+?)(?:\.|,|!|\s+for|\s+and|\s+as)/,
  /interest\s+in\s+(?:joining\s+)?([A-Z][A-Za-z0-9\s&.'-]+?)(?:\.|,|!|\s+and)/,
  /Thank\s+you\s+for\s+applying\s+to\s+([A-Z][A-Za-z0-9\s&.'-]+)/,
  /at\s+([A-Z][A-Za-z0-9\s&.'-]+?)\s+for\s+the/,
  /with\s+([A-Z][A-Za-z0-9\s&.'-]+?)\s+for\s+(?:the|our)/,
];

const STRAY_PHRASE_WORDS = ["the", "our", "a", "an", "this", "your"];

const SENDER_ROLE_SUFFIX =
  /\s+(Careers?|Recruiting|Talent|Jobs?|HR|Team|via\s+.+)$/i;

const GENERIC_SENDER_NAMES = [
  "jobs",
  "careers",
  "recruiting",
  "hr",
  "talent",
  "no-reply",
  "noreply",
  "notifications",
];

const GENERIC_DOMAIN_LABELS = [
  "mail",
  "email",
  "jobs",
  "careers",
  "notifications",
  "noreply",
  "no-reply",
  "talent",
];

function companyFromSenderPattern({ from }: CompanyInput): string | null {
  for (const pattern of SENDER_COMPANY_PATTERNS) {
    const match = from.match(pattern);
    if (match) {
      const company = match[1].trim();
      if (withinLength(company)) return company;
    }
  }
  return null;
}

function companyFromPhrases(text: string): string | null {
  for (const pattern of PHRASE_COMPANY_PATTERNS) {
    const match = text.match(pattern);
    if (!match) continue;

    const company = match[1].trim();
    if (STRAY_PHRASE_WORDS.includes(company.toLowerCase())) continue;
    if (withinLength(company)) return company;
  }
  return null;
}

function companyFromSenderName({ from }: CompanyInput): string | null {
  const match = from.match(/^([^<]+)</);
  if (!match) return null;

  const name = match[1]
    .trim()
    .replace(/^"+|"+$/g, "")
    .replace(SENDER_ROLE_SUFFIX, "");

  if (name.length <= 1) return null;
  if (GENERIC_SENDER_NAMES.includes(name.toLowerCase())) return null;
  return name;
}

// Every run of letters gets a leading capital: "acme labs" -> "Acme Labs", "3m" -> "3M"
export const titleCase = (value: string) =>
  value
    .toLowerCase()
    .replace(/[a-z]+/g, (word) => word.charAt(0).toUpperCase() + word.slice(1));

function companyFromDomain({ from }: CompanyInput): string | null {
  const match = from.match(/@([a-zA-Z0-9.-]+)/);
  if (!match) return null;

  const labels = match[1].split(".");
  if (labels.length < 2) return null;

  const label = labels[0];
  if (!label || GENERIC_DOMAIN_LABELS.includes(label.toLowerCase())) {
    return null;
  }
  return titleCase(label.replace(/-/g, " "));
}

export const COMPANY_STRATEGIES: readonly CompanyStrategy[] = [
  companyFromSenderPattern,
  ({ text, subject }) => companyFromPhrases(text) ?? companyFromPhrases(subject),
  companyFromSenderName,
  companyFromDomain,
];

export function extractCompany(
  input: CompanyInput
): ExtractionCandidate<string> | null {
  for (const strategy of COMPANY_STRATEGIES) {
    const value = strategy(input);
    if (value) {
      return { value, confidence: REGEX_COMPANY_CONFIDENCE };
    }
  }
  return null;
}

// ---- Position extraction ----

export const JOB_TITLES: readonly string[] = jobTitles.titles;
export const JOB_LEVELS: readonly string[] = jobTitles.levels;
export const SPECIALIZATIONS: readonly string[] = jobTitles.specializations;
const ROLE_NOUNS: readonly string[] = jobTitles.roleNouns;

const CONTEXT_BEFORE = 50;
const CONTEXT_AFTER = 20;

const wordPattern = (...parts: string[]) =>
  new RegExp(`\\b${parts.map(escapeRegExp).join("\\s+")}\\b`, "i");

/**
 * Find the first catalogue title in `text`, widened with a level or
 * specialization written next to it ("Senior Data Engineer",
 * "Software Engineer II", "Frontend Software Engineer").
 */
export function matchJobTitle(text: string): string | null {
  for (const title of JOB_TITLES) {
    const match = wordPattern(title).exec(text);
    if (!match) continue;

    const context = text.slice(
      Math.max(0, match.index - CONTEXT_BEFORE),
      Math.min(text.length, match.index + match[0].length + CONTEXT_AFTER)
    );

    const levelBefore = JOB_LEVELS.find((level) =>
      wordPattern(level, title).test(context)
    );
    if (levelBefore) return `${levelBefore} ${title}`;

    const levelAfter = JOB_LEVELS.find((level) =>
      wordPattern(title, level).test(context)
    );
    if (levelAfter) return `${title} ${levelAfter}`;

    const specialization = SPECIALIZATIONS.find((spec) =>
      wordPattern(spec, title).test(context)
    );
    if (specialization) return `${specialization} ${title}`;

    return title;
  }

  // "Senior Payments Engineer" and the like, not in the catalogue
  const roleNouns = ROLE_NOUNS.map(escapeRegExp).join("|");
  for (const level of JOB_LEVELS) {
    for (const spec of SPECIALIZATIONS) {
      const pattern = new RegExp(
        `\\b${escapeRegExp(level)}\\s+${escapeRegExp(spec)}\\s+(${roleNouns})\\b`,
        "i"
      );
      const match = pattern.exec(text);
      if (match) return `${level} ${spec} ${match[1]}`;
    }
  }

  return null;
}

export function extractPosition(
  text: string,
  subject: string
): ExtractionCandidate<string> | null {
  const value = matchJobTitle(text) ?? matchJobTitle(subject);
  return value ? { value, confidence: REGEX_POSITION_CONFIDENCE } : null;
}

// ---- Date extraction ----

const DATE_PATTERNS = [
  /(\d{1,2}[/-]\d{1,2}[/-]\d{2,4})/,
  /((?:Jan|Feb|Mar|Apr|May|Jun|Jul|Aug|Sep|Oct|Nov|Dec)[a-z]*\.?\s+\d{1,2},?\s+\d{4})/,
  /(\d{4}-\d{2}-\d{2})/,
];

// Month and day may be written with or without a leading zero
const withPadding = (format: string): string[] => {
  const variants = new Set<string>();
  for (const month of ["M", "MM"]) {
    for (const day of ["D", "DD"]) {
      variants.add(format.replace(/\bM\b/, month).replace(/\bD\b/, day));
    }
  }
  return [...variants];
};

const DATE_FORMATS = [
  "M/D/YYYY",
  "M-D-YYYY",
  "YYYY-MM-DD",
  "MMMM D, YYYY",
  "MMM D, YYYY",
  "MMMM D YYYY",
  "MMM D YYYY",
].flatMap(withPadding);

const ISO_DATE = "YYYY-MM-DD";

export const formatIsoDate = (date: Date) => dayjs(date).format(ISO_DATE);

function parseDateString(value: string): string | null {
  for (const format of DATE_FORMATS) {
    const parsed = dayjs(value, format, true);
    if (parsed.isValid()) return parsed.format(ISO_DATE);
  }
  return null;
}

const UTC_OFFSET = /([+-])(\d{2})(\d{2})(?:\s*\([^)]*\))?\s*$/;

// Obsolete RFC 2822 zone names
const NAMED_ZONES: Record<string, string> = {
  EST: "-0500",
  EDT: "-0400",
  CST: "-0600",
  CDT: "-0500",
  MST: "-0700",
  MDT: "-0600",
  PST: "-0800",
  PDT: "-0700",
};

const NAMED_ZONE = /\b(EST|EDT|CST|CDT|MST|MDT|PST|PDT)\s*$/i;

/**
 * Calendar date of an RFC 2822 Date header, in the header's own offset.
 */
export function parseDateHeader(header: string): string | null {
  const trimmed = header
    .trim()
    .replace(NAMED_ZONE, (_, zone: string) => NAMED_ZONES[zone.toUpperCase()]);
  if (!trimmed) return null;

  const parsed = dayjs(trimmed);
  if (!parsed.isValid()) return null;

  if (/\b(?:GMT|UTC|UT)\s*$/i.test(trimmed)) {
    return parsed.utc().format(ISO_DATE);
  }

  const offset = trimmed.match(UTC_OFFSET);
  if (!offset) return parsed.format(ISO_DATE);

  const minutes = Number(offset[2]) * 60 + Number(offset[3]);
  return parsed
    .utcOffset(offset[1] === "-" ? -minutes : minutes)
    .format(ISO_DATE);
}

export function extractDate(
  text: string,
  dateHeader: string,
  now: Date = new Date()
): ExtractionCandidate<string> {
  for (const pattern of DATE_PATTERNS) {
    const match = text.match(pattern);
    if (!match) continue;

    const value = parseDateString(match[1]);
    if (value) return { value, confidence: BODY_DATE_CONFIDENCE };
  }

  const fromHeader = parseDateHeader(dateHeader);
  if (fromHeader) {
    return { value: fromHeader, confidence: HEADER_DATE_CONFIDENCE };
  }

  return { value: formatIsoDate(now), confidence: FALLBACK_DATE_CONFIDENCE };
}

// ---- Source extraction ----

export function extractSource(from: string): string | null {
  const match = from.match(/@([a-zA-Z0-9.-]+)/);
  return match ? match[1] : null;
}
