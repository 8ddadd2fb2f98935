export type GrammarIssue = {
  code: string;
  message: string;
  start: number;
  end: number;
  suggestions: string[];
};

export type SpellCorrection = {
  token: string;
  code: string;
  message: string;
  start: number;
  end: number;
  suggestions: string[];
};

export interface UpstreamClientOptions {
  /** Retries after the first attempt for retryable failures. */
  retries: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
}

/**
 * Parses an upstream offset that may arrive as a number or a numeric string.
 * Anything unparsable or negative becomes 0.
 */
export function parseOffset(value: unknown): number {
  if (typeof value === 'number') {
    return Number.isFinite(value) && value >= 0 ? Math.trunc(value) : 0;
  }
  if (typeof value === 'string') {
    const parsed = Number.parseInt(value.trim(), 10);
    return Number.isNaN(parsed) || parsed < 0 ? 0 : parsed;
  }
  return 0;
}

export function joinUrl(base: string, path: string): string {
  return `${base.replace(/\/+$/, '')}${path}`;
}
