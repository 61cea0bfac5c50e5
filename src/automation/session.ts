export interface AutomationSession {
  newPage(): Promise<AutomationPage>;
  close(): Promise<void>;
}

export type FieldKind = "text" | "textarea" | "select" | "checkbox" | "radio" | "file";

export interface PageField {
  label: string;
  kind: FieldKind;
  required: boolean;
  filled: boolean;
}

export interface AutomationPage {
  goto(url: string): Promise<void>;
  url(): string;
  exists(selector: string): Promise<boolean>;
  fill(selector: string, value: string): Promise<void>;
  click(selector: string): Promise<void>;
  uploadFile(selector: string, filePath: string): Promise<void>;
  waitFor(selector: string, timeoutMs?: number): Promise<void>;
  /** Fills the control whose accessible label contains `label`. False when none matches. */
  fillByLabel(label: string, value: string): Promise<boolean>;
  listFields(): Promise<PageField[]>;
  screenshot(path: string): Promise<void>;
  close(): Promise<void>;
}
