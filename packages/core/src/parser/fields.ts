import { MalformedFieldError } from '../types/errors.js';
import type { MetricField } from '../model/metric-sample.js';
import { parseDuration } from './duration.js';

/**
 * Collects one sample's fields while a strategy walks its artifact.
 * A malformed token leaves the field absent and records an issue.
 */
export class FieldCollector {
  private readonly values: Partial<Record<MetricField, number>> = {};
  readonly issues: MalformedFieldError[] = [];

  set(field: MetricField, token: string, parse: TokenParser): void {
    if (this.values[field] !== undefined) {
      return;
    }
    const value = parse(token);
    if (value === undefined) {
      this.reject(field, token);
      return;
    }
    this.values[field] = value;
  }

  reject(field: MetricField, token: string): void {
    this.issues.push(new MalformedFieldError(field, token));
  }

  setNumber(field: MetricField, value: number): void {
    if (this.values[field] === undefined) {
      this.values[field] = value;
    }
  }

  snapshot(): Partial<Record<MetricField, number>> {
    return { ...this.values };
  }
}

export type TokenParser = (token: string) => number | undefined;

const INTEGER_RE = /^\d+$/;

export const parseCount: TokenParser = (token) =>
  INTEGER_RE.test(token) ? Number.parseInt(token, 10) : undefined;

export const parsePercent: TokenParser = (token) =>
  parseCount(token.endsWith('%') ? token.slice(0, -1) : token);

export const parseSeconds: TokenParser = parseDuration;

/** Last whitespace-separated token of a line. */
export function trailingToken(line: string): string {
  const tokens = line.trim().split(/\s+/);
  return tokens[tokens.length - 1] ?? '';
}

/** First whitespace-separated token of a string. */
export function leadingToken(text: string): string {
  return text.trim().split(/\s+/)[0] ?? '';
}
