import { readFile } from 'node:fs/promises';
import path from 'node:path';

import { EMPTY_SAMPLE } from '../model/metric-sample.js';
import type { ArtifactRef } from '../model/test-plan.js';
import { ArtifactMissingError, toError } from '../types/errors.js';
import { err, ok, type Result } from '../types/result.js';
import { parseMetricText, type ParseOutcome } from './strategies.js';

export type ArtifactParseOutcome = ParseOutcome & {
  /** Absolute path that was read. */
  path: string;
} & ({ found: true } | { found: false; error: ArtifactMissingError });

export function resolveArtifactPath(resultsDir: string, ref: ArtifactRef): string {
  return path.isAbsolute(ref.path) ? ref.path : path.join(resultsDir, ref.path);
}

export async function readArtifact(
  filePath: string
): Promise<Result<string, ArtifactMissingError>> {
  try {
    return ok(await readFile(filePath, 'utf8'));
  } catch (error) {
    return err(new ArtifactMissingError(filePath, toError(error)));
  }
}

/**
 * Read and parse one artifact. A missing or unreadable file is not fatal:
 * the outcome is an empty sample with `found: false` and the read error,
 * and the caller decides how to report it.
 */
export async function parseArtifact(
  resultsDir: string,
  ref: ArtifactRef
): Promise<ArtifactParseOutcome> {
  const filePath = resolveArtifactPath(resultsDir, ref);
  const text = await readArtifact(filePath);
  if (!text.ok) {
    return { path: filePath, found: false, error: text.error, sample: EMPTY_SAMPLE, issues: [] };
  }
  return { path: filePath, found: true, ...parseMetricText(text.value, ref.format) };
}
