export const STANDARD_MARKER = "OK";
export const FLAGGED_MARKER = "Unusual clause detected:";

const INSTRUCTIONS = [
  "You are an expert license auditor analyzing software licenses.",
  "Review the following license text carefully.",
  `If it contains only standard permissive clauses commonly found in software licenses, respond with exactly '${STANDARD_MARKER}'.`,
  `If you find any unusual, restrictive, or concerning clauses, respond with '${FLAGGED_MARKER}' followed by a brief explanation of the concerning clauses.`,
].join(" ");

const CHECKLIST = [
  "Usage restrictions",
  "Distribution limitations",
  "Patent claims",
  "Attribution requirements",
  "Warranty and liability terms",
];

export interface TruncatedText {
  text: string;
  omitted: number;
}

/** Keeps the head of the text and appends a marker line naming how much was cut. */
export function truncateLicenseText(text: string, maxChars: number): TruncatedText {
  if (text.length <= maxChars) {
    return { text, omitted: 0 };
  }
  let end = maxChars;
  // Never split a surrogate pair.
  if (end > 0 && isHighSurrogate(text.charCodeAt(end - 1))) {
    end -= 1;
  }
  const omitted = text.length - end;
  return { text: `${text.slice(0, end)}\n[truncated ${omitted} characters]`, omitted };
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

export function buildAuditPrompt(licenseText: string): string {
  const checklist = CHECKLIST.map((item, index) => `${index + 1}. ${item}`).join("\n");
  return `${INSTRUCTIONS}\n\nConsider:\n${checklist}\n\nLicense text to analyze:\n${licenseText}`;
}
