export { ResumeVault } from "./resumeVault";
export type { AddResumeOptions } from "./resumeVault";
