import fs from "fs";
import os from "os";
import path from "path";
import { describe, expect, it } from "vitest";
import { ResumeVault } from "../src/assets";
import { fileSlug, labelWords } from "../src/assets/resumeVault";
import type { ResumeAsset } from "../src/types/context";

const HELLO_SHA256 = "2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824";

function tempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "jobpipe-assets-"));
}

function writeFile(dir: string, name: string, content: string): string {
  const file = path.join(dir, name);
  fs.writeFileSync(file, content);
  return file;
}

describe("ResumeVault.add", () => {
  it("copies the file under its content hash and makes the first one default", () => {
    const dir = tempDir();
    const source = writeFile(dir, "cv.pdf", "hello");
    const vault = new ResumeVault(path.join(dir, "assets"));

    const resume = vault.add(source, { label: "Backend Eng" });

    expect(resume).toEqual({
      label: "Backend Eng",
      path: path.join(dir, "assets", "2cf24dba5fb0-backend-eng.pdf"),
      sha256: HELLO_SHA256,
      isDefault: true,
    });
    expect(fs.readFileSync(resume.path, "utf8")).toBe("hello");
    expect(vault.resumes).toEqual([resume]);
  });

  it("moves the default flag and replaces a re-added file", () => {
    const dir = tempDir();
    const first = writeFile(dir, "a.pdf", "hello");
    const second = writeFile(dir, "b.pdf", "world");
    const vault = new ResumeVault(path.join(dir, "assets"));

    const general = vault.add(first, { label: "general" });
    vault.add(second, { label: "ml", setDefault: true });
    expect(vault.resumes.map((item) => [item.label, item.isDefault])).toEqual([
      ["general", false],
      ["ml", true],
    ]);

    const renamed = vault.add(first, { label: "general-v2" });
    expect(vault.resumes.map((item) => [item.label, item.isDefault])).toEqual([
      ["ml", true],
      ["general-v2", false],
    ]);
    expect(fs.existsSync(general.path)).toBe(false);
    expect(fs.existsSync(renamed.path)).toBe(true);
  });

  it("keeps the default flag on a re-added default resume", () => {
    const dir = tempDir();
    const first = writeFile(dir, "a.pdf", "hello");
    const second = writeFile(dir, "b.pdf", "world");
    const vault = new ResumeVault(path.join(dir, "assets"));

    vault.add(first, { label: "general" });
    vault.add(second, { label: "ml" });
    vault.add(first, { label: "general" });

    expect(vault.defaultResume()?.label).toBe("general");
    expect(vault.resumes.map((item) => item.label)).toEqual(["ml", "general"]);
  });

  it("leaves the resumes it was given untouched", () => {
    const dir = tempDir();
    const existing: ResumeAsset[] = [{ label: "old", path: path.join(dir, "old.pdf"), sha256: "1", isDefault: true }];
    const vault = new ResumeVault(path.join(dir, "assets"), existing);

    vault.add(writeFile(dir, "new.pdf", "hello"), { label: "new", setDefault: true });

    expect(existing).toEqual([{ label: "old", path: path.join(dir, "old.pdf"), sha256: "1", isDefault: true }]);
    expect(vault.resumes.map((item) => item.isDefault)).toEqual([false, true]);
  });

  it("rejects directories", () => {
    const dir = tempDir();
    expect(() => new ResumeVault(path.join(dir, "assets")).add(dir, { label: "x" })).toThrow("Resume path must be a file");
  });
});

describe("vault helpers", () => {
  it("slugs labels for file names", () => {
    expect(fileSlug("  Senior / Staff  ")).toBe("senior-staff");
    expect(fileSlug("C++ dev!")).toBe("c-dev");
    expect(fileSlug("   ")).toBe("resume");
  });

  it("prefers the flagged default resume", () => {
    const resumes: ResumeAsset[] = [
      { label: "a", path: "/a.pdf", sha256: "1", isDefault: false },
      { label: "b", path: "/b.pdf", sha256: "2", isDefault: true },
    ];
    expect(new ResumeVault("/vault", resumes).defaultResume()?.label).toBe("b");
    expect(new ResumeVault("/vault", [{ ...resumes[0] }]).defaultResume()?.label).toBe("a");
    expect(new ResumeVault("/vault").defaultResume()).toBeUndefined();
    expect(new ResumeVault("/vault").isEmpty()).toBe(true);
  });
});

describe("ResumeVault.tailor", () => {
  function vault(dir: string): ResumeAsset[] {
    return [
      { label: "general", path: writeFile(dir, "general.pdf", "g"), sha256: "1", isDefault: true },
      { label: "ml-engineer", path: writeFile(dir, "ml.pdf", "m"), sha256: "2", isDefault: false },
      { label: "frontend react", path: writeFile(dir, "fe.pdf", "f"), sha256: "3", isDefault: false },
    ];
  }

  it("picks the resume whose label overlaps the posting most", async () => {
    const dir = tempDir();
    const tailor = new ResumeVault(dir, vault(dir));

    expect(await tailor.tailor("We ship React and TypeScript on the frontend", "UI Developer")).toEqual({
      resumePath: path.join(dir, "fe.pdf"),
    });
    expect(await tailor.tailor("We train models", "Machine Learning Engineer")).toEqual({
      resumePath: path.join(dir, "ml.pdf"),
    });
  });

  it("falls back to the default resume", async () => {
    const dir = tempDir();
    const tailor = new ResumeVault(dir, vault(dir));
    expect(await tailor.tailor("Accounting role", "Controller")).toEqual({ resumePath: path.join(dir, "general.pdf") });
  });

  it("fails on an empty vault or a missing file", async () => {
    await expect(new ResumeVault("/vault").tailor("jd", "role")).rejects.toThrow("resume vault is empty");
    const missing: ResumeAsset = { label: "general", path: "/nonexistent/general.pdf", sha256: "1", isDefault: true };
    await expect(new ResumeVault("/vault", [missing]).tailor("jd", "role")).rejects.toThrow(
      "resume file missing: /nonexistent/general.pdf"
    );
  });

  it("ignores filler words in labels", () => {
    expect(labelWords("Resume - C++ / CV v2")).toEqual(["c++", "v2"]);
  });
});
