import fs from "fs";
import path from "path";
import { ResumeVault } from "../assets";
import { configPath, defaultConfig, loadConfig, saveConfig, type AppConfig } from "../config";
import { errorMessage, isPipelineError } from "../core/errors";
import { detectPlatform, isPlatform } from "../core/platformDetector";
import { isJobState, isTerminal, JOB_STATES } from "../core/stateMachine";
import { createScraperRegistry, ingest, loadCompanyRegistry } from "../discovery";
import type { JobFilter, JobRecord } from "../types/jobs";
import { hasFlag, parseJobId, positionals, readFlag, readIntFlag, splitList } from "./args";
import { listRuns } from "./history";
import { buildRuntime, runsDir, type Runtime } from "./runtime";

type BulkAction = "approve" | "skip" | "reject";

export async function runCli(argv: string[] = process.argv.slice(2)): Promise<void> {
  const command = argv[0] ?? "";
  const args = argv.slice(1);

  try {
    await dispatch(command, args);
  } catch (error) {
    if (isPipelineError(error)) {
      process.stderr.write(`Error [${error.code}]: ${error.message}\n`);
      process.exitCode = 1;
      return;
    }
    throw error;
  }
}

async function dispatch(command: string, args: string[]): Promise<void> {
  switch (command) {
    case "init":
      handleInit(args);
      return;
    case "add":
      await withRuntime((runtime) => handleAdd(runtime, args));
      return;
    case "queue":
      await withRuntime((runtime) => handleQueue(runtime, args));
      return;
    case "approve":
    case "skip":
    case "reject":
      await withRuntime((runtime) => handleBulk(runtime, command, args));
      return;
    case "tailor":
      await withRuntime((runtime) => handleTailor(runtime, args));
      return;
    case "fill":
      await withRuntime((runtime) => handleFill(runtime, args));
      return;
    case "submit":
      await withRuntime((runtime) => handleSubmit(runtime, args));
      return;
    case "reset-attempts":
      await withRuntime((runtime) => handleResetAttempts(runtime, args));
      return;
    case "run":
      await withRuntime((runtime) => handleRun(runtime, args));
      return;
    case "scrape":
      await withRuntime((runtime) => handleScrape(runtime, args));
      return;
    case "detect":
      handleDetect(args);
      return;
    case "stats":
      await withRuntime(handleStats);
      return;
    case "history":
      handleHistory(args);
      return;
    case "resume":
      handleResume(args);
      return;
    case "profile":
      handleProfile(args);
      return;
    case "config":
      handleConfig(args);
      return;
    default:
      printHelp();
      return;
  }
}

async function withRuntime(run: (runtime: Runtime) => Promise<void>): Promise<void> {
  const runtime = buildRuntime(loadConfig());
  try {
    await run(runtime);
  } finally {
    await runtime.close();
  }
}

function handleInit(args: string[]): void {
  const target = configPath();
  const force = hasFlag(args, "--force");
  let config: AppConfig;
  if (fs.existsSync(target) && !force) {
    config = loadConfig(target);
    process.stdout.write(`Config already exists at ${target} (use --force to overwrite)\n`);
  } else {
    config = defaultConfig();
    saveConfig(config, target);
    process.stdout.write(`Initialized config at ${target}\n`);
  }

  fs.mkdirSync(config.app.dataDir, { recursive: true });
  if (fs.existsSync(config.app.answersPath)) {
    return;
  }
  const starter = findStarterFile("answers.example.json");
  if (!starter) {
    process.stderr.write("Starter answers table not found; create answers.json by hand.\n");
    return;
  }
  fs.copyFileSync(starter, config.app.answersPath);
  process.stdout.write(`Copied starter answers table to ${config.app.answersPath}\n`);
}

async function handleAdd(runtime: Runtime, args: string[]): Promise<void> {
  const [url] = positionals(args, ["--company", "--role", "--jd-file"]);
  if (!url) {
    process.stderr.write("URL required. Use: jobpipe add <url> [--company <name>] [--role <title>] [--jd-file <path>]\n");
    process.exitCode = 1;
    return;
  }

  const jdFile = readFlag(args, "--jd-file");
  const jdText = jdFile ? fs.readFileSync(jdFile, "utf8") : undefined;
  const { job, created } = await runtime.store.insert({
    url,
    company: readFlag(args, "--company"),
    roleTitle: readFlag(args, "--role"),
    jdText,
    source: "manual",
  });

  if (created) {
    process.stdout.write(`Added #${job.id} (${job.platform ?? "?"}): ${job.url}\n`);
  } else {
    process.stdout.write(`Already queued as #${job.id} [${job.state}]\n`);
  }
}

async function handleQueue(runtime: Runtime, args: string[]): Promise<void> {
  const filter: JobFilter = {};
  const stateArg = readFlag(args, "--state");
  if (stateArg) {
    const states = splitList(stateArg);
    const invalid = states.filter((state) => !isJobState(state));
    if (invalid.length > 0) {
      throw new Error(`Unknown state '${invalid.join(", ")}'. Use one of: ${JOB_STATES.join(", ")}`);
    }
    filter.state = states.filter(isJobState);
  }
  const platformArg = readFlag(args, "--platform");
  if (platformArg) {
    if (!isPlatform(platformArg)) {
      throw new Error(`Unknown platform '${platformArg}'`);
    }
    filter.platform = platformArg;
  }

  const jobs = await runtime.store.list(filter);
  if (jobs.length === 0) {
    process.stdout.write("Queue is empty.\n");
    return;
  }
  for (const job of jobs) {
    process.stdout.write(`${formatJob(job)}\n`);
  }
}

async function handleBulk(runtime: Runtime, action: BulkAction, args: string[]): Promise<void> {
  const reason = readFlag(args, "--reason");
  const perform = (id: number): Promise<JobRecord> => {
    switch (action) {
      case "approve":
        return runtime.orchestrator.approve(id);
      case "skip":
        return runtime.orchestrator.skip(id);
      case "reject":
        return runtime.orchestrator.reject(id, reason);
    }
  };

  if (!hasFlag(args, "--all")) {
    const [rawId] = positionals(args, ["--reason"]);
    const job = await perform(parseJobId(rawId));
    process.stdout.write(`#${job.id} -> ${job.state}\n`);
    return;
  }

  const candidates =
    action === "reject"
      ? (await runtime.store.list()).filter((job) => !isTerminal(job.state))
      : await runtime.store.list({ state: "scraped" });

  let changed = 0;
  for (const job of candidates) {
    try {
      await perform(job.id);
      changed += 1;
    } catch (error) {
      if (!isPipelineError(error)) {
        throw error;
      }
      process.stderr.write(`#${job.id}: Error [${error.code}]: ${error.message}\n`);
      process.exitCode = 1;
    }
  }
  process.stdout.write(`${action}: ${changed}/${candidates.length} job(s) updated\n`);
}

async function handleTailor(runtime: Runtime, args: string[]): Promise<void> {
  const job = await runtime.orchestrator.tailor(parseJobId(args[0]));
  process.stdout.write(`#${job.id} resume: ${job.resumePath ?? "(none)"}\n`);
}

async function handleFill(runtime: Runtime, args: string[]): Promise<void> {
  const [rawId] = positionals(args, []);
  const outcome = await runtime.orchestrator.fill(parseJobId(rawId), { submit: hasFlag(args, "--submit") });
  printOutcome(outcome.ok, outcome.job, outcome.error);
}

async function handleSubmit(runtime: Runtime, args: string[]): Promise<void> {
  const outcome = await runtime.orchestrator.submit(parseJobId(args[0]));
  printOutcome(outcome.ok, outcome.job, outcome.error);
}

async function handleResetAttempts(runtime: Runtime, args: string[]): Promise<void> {
  const job = await runtime.store.resetAttempts(parseJobId(args[0]));
  process.stdout.write(`#${job.id} attemptCount reset to ${job.attemptCount}\n`);
}

async function handleRun(runtime: Runtime, args: string[]): Promise<void> {
  const { app } = runtime.config;
  const options = {
    dryRun: hasFlag(args, "--dry-run"),
    tailor: hasFlag(args, "--tailor"),
    autoSubmit: hasFlag(args, "--auto-submit") || app.autoSubmit,
    maxFillsPerRun: readIntFlag(args, "--max") ?? app.maxFillsPerRun,
    maxAttempts: app.maxAttempts,
  };

  const controller = new AbortController();
  const stop = (): void => {
    if (!controller.signal.aborted) {
      runtime.logger.info("Stop requested; finishing the current job");
      controller.abort();
    }
  };
  process.once("SIGINT", stop);
  process.once("SIGTERM", stop);

  try {
    if (hasFlag(args, "--loop")) {
      const intervalSeconds = readIntFlag(args, "--interval");
      const intervalMs = intervalSeconds !== undefined ? intervalSeconds * 1000 : app.tickIntervalMs;
      const ticks = await runtime.scheduler.runLoop({ ...options, intervalMs, signal: controller.signal });
      process.stdout.write(`Daemon ran ${ticks} tick(s)\n`);
      return;
    }

    const summary = await runtime.scheduler.tick({ ...options, signal: controller.signal });
    for (const result of summary.results) {
      const reason = result.reason ? ` (${result.reason})` : "";
      const abandoned = result.abandoned ? " [abandoned]" : "";
      process.stdout.write(`#${result.jobId} ${result.status} -> ${result.state}${abandoned}${reason}\n`);
    }
    process.stdout.write(
      `Run ${summary.runId}: ${summary.succeeded} succeeded, ${summary.failed} failed, ${summary.skipped} skipped` +
        `${summary.stoppedEarly ? ", stopped early" : ""}\n`
    );
  } finally {
    process.removeListener("SIGINT", stop);
    process.removeListener("SIGTERM", stop);
  }
}

async function handleScrape(runtime: Runtime, args: string[]): Promise<void> {
  const registry = createScraperRegistry();
  const registryPath = readFlag(args, "--registry");
  const [source, ...queryParts] = positionals(args, ["--registry"]);
  const query = queryParts.length > 0 ? queryParts.join(" ") : undefined;

  if (registryPath) {
    const companies = loadCompanyRegistry(registryPath);
    for (const company of companies) {
      try {
        const result = await ingest(runtime.store, registry, company.source, {
          query: source ? [source, ...queryParts].join(" ") : undefined,
          companyName: company.name,
          logger: runtime.logger,
        });
        process.stdout.write(`${company.name}: ${result.added} added, ${result.duplicates} duplicates\n`);
      } catch (error) {
        process.stderr.write(`${company.name} (${company.source}) failed: ${errorMessage(error)}\n`);
        process.exitCode = 1;
      }
    }
    return;
  }

  if (!source) {
    process.stderr.write("Source required. Use: jobpipe scrape <lever:slug|greenhouse:slug|ashby:slug|wellfound:slug|hn> [query]\n");
    process.exitCode = 1;
    return;
  }
  const result = await ingest(runtime.store, registry, source, { query, logger: runtime.logger });
  process.stdout.write(`${result.total} found, ${result.added} added, ${result.duplicates} duplicates\n`);
}

function handleDetect(args: string[]): void {
  const url = args[0];
  if (!url) {
    process.stderr.write("URL required. Use: jobpipe detect <url>\n");
    process.exitCode = 1;
    return;
  }
  process.stdout.write(`${detectPlatform(url)}\n`);
}

async function handleStats(runtime: Runtime): Promise<void> {
  const stats = await runtime.store.stats();
  process.stdout.write(`Total: ${stats.total}\n`);
  for (const state of JOB_STATES) {
    process.stdout.write(`  ${state.padEnd(10)} ${stats.byState[state]}\n`);
  }
  process.stdout.write(`Attempted: ${stats.attempted}\n`);
  process.stdout.write(`Success rate: ${(stats.successRate * 100).toFixed(1)}%\n`);
}

function handleHistory(args: string[]): void {
  const config = loadConfig();
  const limit = readIntFlag(args, "--limit") ?? 10;
  const runs = listRuns(runsDir(config), limit > 0 ? limit : 10);

  if (runs.length === 0) {
    process.stdout.write("No runs found.\n");
    return;
  }

  for (const run of runs) {
    process.stdout.write(
      `${run.runId} | ${run.startedAt} | dryRun=${run.dryRun} | autoSubmit=${run.autoSubmit} | succeeded=${run.succeeded} | failed=${run.failed} | skipped=${run.skipped} | abandoned=${run.abandoned}\n`
    );
    process.stdout.write(`  log: ${run.logPath}\n`);
  }
}

function handleResume(args: string[]): void {
  const subcommand = args[0] ?? "";
  if (subcommand !== "add") {
    process.stderr.write("Unknown resume command. Use: jobpipe resume add <path>\n");
    process.exitCode = 1;
    return;
  }

  const [filePath] = positionals(args.slice(1), ["--label"]);
  if (!filePath) {
    process.stderr.write("Resume path required. Use: jobpipe resume add <path> [--label <name>] [--default]\n");
    process.exitCode = 1;
    return;
  }

  const label = readFlag(args, "--label") ?? path.basename(filePath, path.extname(filePath));
  const config = loadConfig();
  const vault = new ResumeVault(config.app.assetsDir, config.resumes);
  const resume = vault.add(filePath, { label, setDefault: hasFlag(args, "--default") });

  saveConfig({ ...config, resumes: vault.resumes });
  process.stdout.write(`Added resume '${resume.label}' to vault${resume.isDefault ? " (default)" : ""}.\n`);
}

function handleProfile(args: string[]): void {
  if (args[0] !== "set") {
    process.stderr.write("Unknown profile command. Use: jobpipe profile set [flags]\n");
    process.exitCode = 1;
    return;
  }

  const config = loadConfig();
  const profile = { ...config.profile };

  const fullName = readFlag(args, "--full-name");
  if (fullName) {
    profile.fullName = fullName;
  }
  const email = readFlag(args, "--email");
  if (email) {
    profile.email = email;
  }
  const phone = readFlag(args, "--phone");
  if (phone) {
    profile.phone = phone;
  }
  const location = readFlag(args, "--location");
  if (location) {
    profile.location = location;
  }
  const linkedin = readFlag(args, "--linkedin");
  if (linkedin) {
    profile.linkedin = linkedin;
  }
  const website = readFlag(args, "--website");
  if (website) {
    profile.website = website;
  }
  const github = readFlag(args, "--github");
  if (github) {
    profile.github = github;
  }
  const summary = readFlag(args, "--summary");
  if (summary) {
    profile.summary = summary;
  }
  const skills = readFlag(args, "--skills");
  if (skills) {
    profile.skills = splitList(skills);
  }

  saveConfig({ ...config, profile });
  process.stdout.write("Profile updated.\n");
}

function handleConfig(args: string[]): void {
  if (args[0] !== "show") {
    process.stderr.write("Unknown config command. Use: jobpipe config show\n");
    process.exitCode = 1;
    return;
  }

  const redacted = redactConfig(loadConfig());
  process.stdout.write(`${JSON.stringify(redacted, null, 2)}\n`);
}

function printOutcome(ok: boolean, job: JobRecord, error?: string): void {
  if (ok) {
    process.stdout.write(`#${job.id} -> ${job.state} (attempt ${job.attemptCount})\n`);
  } else {
    process.stderr.write(`#${job.id} attempt ${job.attemptCount} failed: ${error ?? "unknown error"}\n`);
    process.exitCode = 1;
  }
  if (job.screenshotRef) {
    process.stdout.write(`  screenshot: ${job.screenshotRef}\n`);
  }
}

export function formatJob(job: JobRecord): string {
  const parts = [
    `#${job.id}`,
    `[${job.state}]`,
    job.platform ?? "?",
    `${job.company || "?"} / ${job.roleTitle || "?"}`,
    job.url,
  ];
  if (job.attemptCount > 0) {
    parts.push(`attempts=${job.attemptCount}`);
  }
  const line = parts.join(" ");
  return job.lastError ? `${line}\n    last error: ${job.lastError}` : line;
}

export function redactConfig(config: AppConfig): AppConfig {
  const profile = {
    ...config.profile,
    email: redactValue(config.profile.email),
    phone: redactValue(config.profile.phone),
  };

  const resumes = config.resumes.map((resume) => ({
    ...resume,
    path: redactPath(resume.path),
    sha256: redactValue(resume.sha256),
  }));

  return {
    ...config,
    profile,
    resumes,
  };
}

export function redactValue(value: string): string {
  if (value.length === 0) {
    return value;
  }

  if (value.length <= 4) {
    return "***";
  }

  return `${value.slice(0, 2)}***${value.slice(-2)}`;
}

function redactPath(value: string): string {
  const parts = value.split(/[/\\]/);
  const filename = parts[parts.length - 1];
  return filename ? `***${filename}` : "***";
}

/** Looks for `data/<name>` beside the package, from source or from dist/. */
export function findStarterFile(name: string, startDir: string = __dirname): string | null {
  let dir = startDir;
  for (let depth = 0; depth < 5; depth += 1) {
    const candidate = path.join(dir, "data", name);
    if (fs.existsSync(candidate)) {
      return candidate;
    }
    const parent = path.dirname(dir);
    if (parent === dir) {
      break;
    }
    dir = parent;
  }
  return null;
}

function printHelp(): void {
  process.stdout.write("jobpipe <command>\n\n");
  process.stdout.write("Commands:\n");
  process.stdout.write("  init [--force]\n");
  process.stdout.write("  add <url> [--company <name>] [--role <title>] [--jd-file <path>]\n");
  process.stdout.write("  queue [--state <state[,state]>] [--platform <platform>]\n");
  process.stdout.write("  approve <id>|--all\n");
  process.stdout.write("  skip <id>|--all\n");
  process.stdout.write("  reject <id>|--all [--reason <text>]\n");
  process.stdout.write("  tailor <id>\n");
  process.stdout.write("  fill <id> [--submit]\n");
  process.stdout.write("  submit <id>\n");
  process.stdout.write("  reset-attempts <id>\n");
  process.stdout.write("  run [--dry-run] [--tailor] [--auto-submit] [--max N] [--loop] [--interval <seconds>]\n");
  process.stdout.write("  scrape <lever:slug|greenhouse:slug|ashby:slug|wellfound:slug|hn> [query]\n");
  process.stdout.write("  scrape --registry <path> [query]\n");
  process.stdout.write("  detect <url>\n");
  process.stdout.write("  stats\n");
  process.stdout.write("  history [--limit 10]\n");
  process.stdout.write("  resume add <path> [--label <name>] [--default]\n");
  process.stdout.write(
    "  profile set [--full-name <name>] [--email <email>] [--phone <phone>] [--location <loc>] [--linkedin <url>] [--website <url>] [--github <url>] [--summary <text>] [--skills <a,b>]\n"
  );
  process.stdout.write("  config show\n");
}
