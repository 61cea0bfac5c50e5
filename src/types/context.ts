export interface ApplicantProfile {
  fullName: string;
  email: string;
  phone: string;
  location?: string;
  linkedin?: string;
  website?: string;
  github?: string;
  summary?: string;
  skills?: string[];
}

export interface LlmConfig {
  provider: "openai";
  model: string;
  maxOutputTokens: number;
  enabled: boolean;
}

export interface ResumeAsset {
  label: string;
  path: string;
  sha256: string;
  isDefault: boolean;
}

/** What the AI answerer is told about the applicant and the job being applied to. */
export interface ApplicantContext {
  profile: ApplicantProfile;
  company: string;
  roleTitle: string;
  jdText?: string;
}
