import fs from "fs";
import { z } from "zod";

export type MatchKind = "exact" | "substring" | "regex";

export interface AnswerEntry {
  questionPattern: string;
  answerValue: string;
  matchKind: MatchKind;
}

const answerEntrySchema = z
  .object({
    questionPattern: z.string().trim().min(1),
    answerValue: z.string(),
    matchKind: z.enum(["exact", "substring", "regex"]).default("substring"),
  })
  .superRefine((entry, ctx) => {
    if (entry.matchKind !== "regex") {
      return;
    }
    try {
      new RegExp(entry.questionPattern, "i");
    } catch (error) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["questionPattern"],
        message: `invalid regex: ${error instanceof Error ? error.message : String(error)}`,
      });
    }
  });

const answerTableSchema = z.array(answerEntrySchema);

export function parseAnswerTable(raw: unknown): AnswerEntry[] {
  const parsed = answerTableSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new Error(`Invalid answers table: ${issues}`);
  }
  return parsed.data;
}

/** A missing table is an empty table; every question then falls through to the AI answerer. */
export function loadAnswerTable(filePath: string): AnswerEntry[] {
  if (!fs.existsSync(filePath)) {
    return [];
  }
  const raw = fs.readFileSync(filePath, "utf8");
  return parseAnswerTable(JSON.parse(raw));
}
