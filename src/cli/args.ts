export function readFlag(args: string[], name: string): string | undefined {
  const index = args.indexOf(name);
  if (index === -1) {
    return undefined;
  }

  const value = args[index + 1];
  return value === undefined || value.startsWith("--") ? undefined : value;
}

export function hasFlag(args: string[], name: string): boolean {
  return args.includes(name);
}

export function splitList(value: string): string[] {
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/** Arguments that are neither flags nor the values of `valueFlags`. */
export function positionals(args: string[], valueFlags: readonly string[]): string[] {
  const result: string[] = [];
  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];
    if (arg.startsWith("--")) {
      if (valueFlags.includes(arg)) {
        i += 1;
      }
      continue;
    }
    result.push(arg);
  }
  return result;
}

export function readIntFlag(args: string[], name: string): number | undefined {
  const raw = readFlag(args, name);
  if (raw === undefined) {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`${name} expects a non-negative integer, got '${raw}'`);
  }
  return value;
}

export function parseJobId(raw: string | undefined): number {
  const value = Number(raw);
  if (raw === undefined || !Number.isInteger(value) || value <= 0) {
    throw new Error(`Expected a job id, got '${raw ?? ""}'`);
  }
  return value;
}
