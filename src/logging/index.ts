export { createLogger, childLogger } from "./logger";
export type { Logger } from "./logger";
export { createRunLogger, writeRunManifest, nullRunLogger } from "./runLogger";
export type { RunEvent, RunLogger, RunManifest, RunStep } from "./runLogger";
