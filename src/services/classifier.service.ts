import indicators from "../data/indicators.json";
import { EmailClassification } from "../types";

export const REJECTION_INDICATORS: readonly string[] = indicators.rejection;
export const INCOMPLETE_INDICATORS: readonly string[] = indicators.incomplete;

// Order matters: rejections often mention "application" too, so they are
// ruled out before anything else.
const CLASSIFICATION_RULES: {
  classification: Exclude<EmailClassification, "candidate">;
  phrases: readonly string[];
}[] = [
  { classification: "rejection", phrases: REJECTION_INDICATORS },
  { classification: "incomplete", phrases: INCOMPLETE_INDICATORS },
];

const combine = (text: string, subject: string) =>
  `${text} ${subject}`.toLowerCase();

const containsAny = (haystack: string, phrases: readonly string[]) =>
  phrases.some((phrase) => haystack.includes(phrase));

export function isRejectionEmail(text: string, subject: string): boolean {
  return containsAny(combine(text, subject), REJECTION_INDICATORS);
}

export function isIncompleteApplication(
  text: string,
  subject: string
): boolean {
  return containsAny(combine(text, subject), INCOMPLETE_INDICATORS);
}

export function classifyEmail(
  text: string,
  subject: string
): EmailClassification {
  const combined = combine(text, subject);

  for (const { classification, phrases } of CLASSIFICATION_RULES) {
    if (containsAny(combined, phrases)) {
      return classification;
    }
  }

  return "candidate";
}
