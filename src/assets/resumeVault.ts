import { createHash } from "crypto";
import fs from "fs";
import path from "path";
import type { ResumeTailor } from "../types/collaborators";
import type { ResumeAsset } from "../types/context";

export interface AddResumeOptions {
  label: string;
  setDefault?: boolean;
}

/**
 * Resumes known to config and the directory holding their copies. A copy is keyed by
 * its content hash: adding the same file again replaces the entry (and the old copy)
 * rather than listing it twice.
 *
 * As a tailor it picks the resume whose label words appear most in the role and job
 * description, e.g. "ml-engineer" for a machine-learning posting, else the default.
 */
export class ResumeVault implements ResumeTailor {
  private readonly dir: string;
  private entries: ResumeAsset[];

  constructor(dir: string, resumes: readonly ResumeAsset[] = []) {
    this.dir = dir;
    this.entries = resumes.map((resume) => ({ ...resume }));
  }

  get resumes(): ResumeAsset[] {
    return this.entries.map((resume) => ({ ...resume }));
  }

  isEmpty(): boolean {
    return this.entries.length === 0;
  }

  defaultResume(): ResumeAsset | undefined {
    return this.entries.find((resume) => resume.isDefault) ?? this.entries[0];
  }

  add(sourcePath: string, options: AddResumeOptions): ResumeAsset {
    if (!fs.statSync(sourcePath).isFile()) {
      throw new Error("Resume path must be a file");
    }

    const content = fs.readFileSync(sourcePath);
    const sha256 = createHash("sha256").update(content).digest("hex");
    const ext = path.extname(sourcePath) || ".pdf";
    const target = path.join(this.dir, `${sha256.slice(0, 12)}-${fileSlug(options.label)}${ext}`);
    fs.mkdirSync(this.dir, { recursive: true });
    fs.writeFileSync(target, content);

    const replaced = this.entries.find((resume) => resume.sha256 === sha256);
    if (replaced && replaced.path !== target) {
      fs.rmSync(replaced.path, { force: true });
    }

    const others = this.entries.filter((resume) => resume.sha256 !== sha256);
    const isDefault = options.setDefault === true || replaced?.isDefault === true || others.length === 0;
    const resume: ResumeAsset = { label: options.label, path: target, sha256, isDefault };
    this.entries = [...(isDefault ? others.map((item) => ({ ...item, isDefault: false })) : others), resume];
    return { ...resume };
  }

  async tailor(jdText: string, role: string): Promise<{ resumePath: string }> {
    const fallback = this.defaultResume();
    if (!fallback) {
      throw new Error("resume vault is empty");
    }

    const haystack = `${role} ${jdText}`.toLowerCase();
    let best = fallback;
    let bestScore = 0;
    for (const resume of this.entries) {
      const score = labelWords(resume.label).filter((word) => haystack.includes(word)).length;
      if (score > bestScore) {
        best = resume;
        bestScore = score;
      }
    }

    if (!fs.existsSync(best.path)) {
      throw new Error(`resume file missing: ${best.path}`);
    }
    return { resumePath: best.path };
  }
}

export function labelWords(label: string): string[] {
  return label
    .toLowerCase()
    .split(/[^a-z0-9+#]+/)
    .filter((word) => word.length >= 2 && word !== "resume" && word !== "cv");
}

export function fileSlug(label: string): string {
  const slug = label
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
  return slug || "resume";
}
