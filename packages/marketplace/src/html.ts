export interface ParseDiagnostic {
  readonly field: string;
  readonly issue: 'missing' | 'malformed';
  readonly detail?: string;
}

export const collapseWhitespace = (value: string): string => value.replace(/\s+/g, ' ').trim();

export const toAbsoluteUrl = (value: string | undefined, origin: string): string | undefined => {
  const trimmed = value?.trim();
  if (!trimmed) {
    return undefined;
  }

  try {
    const url = new URL(trimmed, origin);
    return url.protocol === 'http:' || url.protocol === 'https:' ? url.toString() : undefined;
  } catch {
    return undefined;
  }
};

export const nonEmpty = (value: string | undefined): string | undefined => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
};
