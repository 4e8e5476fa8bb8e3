import { OPEN_TO_OPPORTUNITIES } from "@shared/types/profiling";
import type { LabelledPatterns, ProfilingKeywordTables } from "./keyword-tables";

// Best-effort mappers from a free-text answer to a normalized profile value.
// None of them throw: when nothing in the tables matches, the trimmed answer is
// returned as-is. Table order decides ties (first entry wins).

const YEARS_PATTERN = /(\d+)\s*year/;
const MONTHS_PATTERN = /(\d+)\s*month/;

function includesAny(text: string, needles: readonly string[]): boolean {
  return needles.some((needle) => text.includes(needle));
}

function firstMatchingLabel(
  text: string,
  table: LabelledPatterns,
): string | null {
  for (const entry of table) {
    if (includesAny(text, entry.patterns)) {
      return entry.label;
    }
  }
  return null;
}

export function extractCurrentRole(
  text: string,
  tables: ProfilingKeywordTables,
): string {
  const lowerText = text.toLowerCase();

  if (includesAny(lowerText, tables.studentKeywords)) {
    return "Student";
  }

  return firstMatchingLabel(lowerText, tables.currentRoles) ?? text.trim();
}

export function extractExperienceLevel(
  text: string,
  tables: ProfilingKeywordTables,
): string {
  const lowerText = text.toLowerCase();

  // Academic answers ("third year at BITS") are kept verbatim
  if (includesAny(lowerText, tables.academicYears)) {
    return text.trim();
  }
  if (includesAny(lowerText, tables.institutions)) {
    return text.trim();
  }

  const years = lowerText.match(YEARS_PATTERN);
  if (years) {
    return years[0];
  }
  const months = lowerText.match(MONTHS_PATTERN);
  if (months) {
    return months[0];
  }

  if (includesAny(lowerText, tables.fresherPhrases)) {
    return "0 years";
  }

  return text.trim();
}

export function extractTargetRole(
  text: string,
  tables: ProfilingKeywordTables,
): string {
  return firstMatchingLabel(text.toLowerCase(), tables.targetRoles) ?? text.trim();
}

export function extractTargetCompany(
  text: string,
  tables: ProfilingKeywordTables,
): string {
  const lowerText = text.toLowerCase();

  if (includesAny(lowerText, tables.companyIndifference)) {
    return OPEN_TO_OPPORTUNITIES;
  }

  return firstMatchingLabel(lowerText, tables.companies) ?? text.trim();
}

export interface EntityExtractor {
  extractCurrentRole(text: string): string;
  extractExperienceLevel(text: string): string;
  extractTargetRole(text: string): string;
  extractTargetCompany(text: string): string;
}

export function createEntityExtractor(
  tables: ProfilingKeywordTables,
): EntityExtractor {
  return {
    extractCurrentRole: (text) => extractCurrentRole(text, tables),
    extractExperienceLevel: (text) => extractExperienceLevel(text, tables),
    extractTargetRole: (text) => extractTargetRole(text, tables),
    extractTargetCompany: (text) => extractTargetCompany(text, tables),
  };
}
