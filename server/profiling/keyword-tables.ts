import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import { z } from "zod";
import { fromError } from "zod-validation-error";

const DEFAULT_TABLES_PATH = fileURLToPath(
  new URL("./profiling-keywords.json", import.meta.url),
);

const labelledPatternsSchema = z
  .array(
    z.object({
      label: z.string().min(1),
      patterns: z.array(z.string().min(1)).min(1),
    }),
  )
  .min(1);

const keywordTablesSchema = z.object({
  studentKeywords: z.array(z.string().min(1)).min(1),
  currentRoles: labelledPatternsSchema,
  academicYears: z.array(z.string().min(1)),
  institutions: z.array(z.string().min(1)),
  fresherPhrases: z.array(z.string().min(1)),
  targetRoles: labelledPatternsSchema,
  companyIndifference: z.array(z.string().min(1)),
  companies: labelledPatternsSchema,
});

type RawKeywordTables = z.infer<typeof keywordTablesSchema>;

export type LabelledPatterns = ReadonlyArray<{
  readonly label: string;
  readonly patterns: readonly string[];
}>;

export type ProfilingKeywordTables = {
  readonly studentKeywords: readonly string[];
  readonly currentRoles: LabelledPatterns;
  readonly academicYears: readonly string[];
  readonly institutions: readonly string[];
  readonly fresherPhrases: readonly string[];
  readonly targetRoles: LabelledPatterns;
  readonly companyIndifference: readonly string[];
  readonly companies: LabelledPatterns;
};

function freezeTables(raw: RawKeywordTables): ProfilingKeywordTables {
  const freezeLabelled = (entries: RawKeywordTables["currentRoles"]): LabelledPatterns =>
    Object.freeze(
      entries.map((entry) =>
        Object.freeze({
          label: entry.label,
          // Patterns are matched against lower-cased text
          patterns: Object.freeze(entry.patterns.map((p) => p.toLowerCase())),
        }),
      ),
    );
  const freezeList = (values: string[]): readonly string[] =>
    Object.freeze(values.map((v) => v.toLowerCase()));

  return Object.freeze({
    studentKeywords: freezeList(raw.studentKeywords),
    currentRoles: freezeLabelled(raw.currentRoles),
    academicYears: freezeList(raw.academicYears),
    institutions: freezeList(raw.institutions),
    fresherPhrases: freezeList(raw.fresherPhrases),
    targetRoles: freezeLabelled(raw.targetRoles),
    companyIndifference: freezeList(raw.companyIndifference),
    companies: freezeLabelled(raw.companies),
  });
}

export function parseKeywordTables(data: unknown): ProfilingKeywordTables {
  const result = keywordTablesSchema.safeParse(data);
  if (!result.success) {
    throw new Error(
      `Invalid profiling keyword tables: ${fromError(result.error).toString()}`,
    );
  }
  return freezeTables(result.data);
}

export function loadKeywordTables(
  filePath: string = DEFAULT_TABLES_PATH,
): ProfilingKeywordTables {
  const raw: unknown = JSON.parse(readFileSync(filePath, "utf8"));
  const tables = parseKeywordTables(raw);
  console.log(
    `[Profiling] Loaded keyword tables: ${tables.currentRoles.length} current roles, ` +
      `${tables.targetRoles.length} target roles, ${tables.companies.length} companies`,
  );
  return tables;
}

let defaultTables: ProfilingKeywordTables | null = null;

export function getDefaultKeywordTables(): ProfilingKeywordTables {
  if (!defaultTables) {
    defaultTables = loadKeywordTables();
  }
  return defaultTables;
}
