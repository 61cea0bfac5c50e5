import type { ApplicantProfile } from "../types/context";
import type { Platform } from "../types/jobs";

export type ProfileField = "fullName" | "firstName" | "lastName" | "email" | "phone" | "location" | "linkedin" | "github" | "website";

export interface PlatformSelectors {
  /** Path appended to the posting URL to reach the form, when the form lives elsewhere. */
  applyPathSuffix?: string;
  applyButton?: string;
  form: string;
  fields: Partial<Record<ProfileField, string>>;
  resume: string;
  submit: string;
  /** Any one of these appearing after submit counts as confirmation. */
  confirmation: string[];
}

export const PLATFORM_SELECTORS: Record<Exclude<Platform, "unknown">, PlatformSelectors> = {
  lever: {
    applyPathSuffix: "/apply",
    form: "form",
    fields: {
      fullName: 'input[name="name"]',
      email: 'input[name="email"]',
      phone: 'input[name="phone"]',
      location: 'input[name="location"]',
      linkedin: 'input[name="urls[LinkedIn]"]',
      github: 'input[name="urls[GitHub]"]',
      website: 'input[name="urls[Portfolio]"]',
    },
    resume: 'input[type="file"][name="resume"], input[type="file"]',
    submit: 'button[type="submit"], #btn-submit',
    confirmation: [".application-confirmation", "text=/application (was )?(submitted|received)/i"],
  },
  greenhouse: {
    form: "form",
    fields: {
      firstName: "#first_name",
      lastName: "#last_name",
      email: "#email",
      phone: "#phone",
      location: "#job_application_location, #candidate-location",
      linkedin: 'input[name*="linkedin"], input[id*="linkedin"]',
      github: 'input[name*="github"], input[id*="github"]',
      website: 'input[name*="website"], input[name*="portfolio"], input[id*="website"]',
    },
    resume: 'input[type="file"]#resume, input[type="file"][name*="resume"], #resume_file, input[type="file"]',
    submit: '#submit_app, button[type="submit"], input[type="submit"]',
    confirmation: ["#application_confirmation", "text=/thank you for applying/i"],
  },
  ashby: {
    applyPathSuffix: "/application",
    form: "form",
    fields: {
      fullName: 'input[name="_systemfield_name"]',
      email: 'input[name="_systemfield_email"], input[type="email"]',
      phone: 'input[type="tel"]',
      linkedin: 'input[name*="linkedin" i]',
      github: 'input[name*="github" i]',
    },
    resume: 'input[type="file"]#_systemfield_resume, input[type="file"]',
    submit: 'button[type="submit"], button:has-text("Submit Application")',
    confirmation: ["text=/application (was )?(submitted|received)/i"],
  },
  workday: {
    applyButton: 'a[data-automation-id="jobPostingApplyButton"], button[data-automation-id="jobPostingApplyButton"]',
    form: '[data-automation-id="applyFlowPage"], form',
    fields: {
      firstName: 'input[data-automation-id="legalNameSection_firstName"]',
      lastName: 'input[data-automation-id="legalNameSection_lastName"]',
      email: 'input[data-automation-id="email"]',
      phone: 'input[data-automation-id="phone-number"]',
      location: 'input[data-automation-id="addressSection_city"]',
    },
    resume: 'input[type="file"][data-automation-id="file-upload-input-ref"], input[type="file"]',
    submit: 'button[data-automation-id="bottom-navigation-next-button"]:has-text("Submit"), button:has-text("Submit")',
    confirmation: ['[data-automation-id="congratulationsPopup"]', "text=/application (was )?submitted|thank you for applying/i"],
  },
};

export function profileValue(profile: ApplicantProfile, field: ProfileField): string | undefined {
  const [first, ...rest] = profile.fullName.trim().split(/\s+/);
  switch (field) {
    case "firstName":
      return first || undefined;
    case "lastName":
      return rest.length > 0 ? rest.join(" ") : undefined;
    default: {
      const value = profile[field];
      return value && value.length > 0 ? value : undefined;
    }
  }
}

export function applyUrl(postingUrl: string, selectors: PlatformSelectors): string {
  const suffix = selectors.applyPathSuffix;
  if (!suffix) {
    return postingUrl;
  }
  const [base, query] = postingUrl.split("?", 2);
  const trimmed = base.replace(/\/+$/, "");
  if (trimmed.endsWith(suffix)) {
    return postingUrl;
  }
  return `${trimmed}${suffix}${query ? `?${query}` : ""}`;
}
