import path from 'node:path';

import { loadManifest, type Manifest } from '../manifest/manifest.js';
import {
  EMPTY_SAMPLE,
  mergeSamples,
  type MetricSample,
} from '../model/metric-sample.js';
import { ResultSet } from '../model/result-set.js';
import type { TestCase, TestPlan } from '../model/test-plan.js';
import { parseArtifact } from '../parser/artifact-reader.js';
import { MissingInputError } from '../types/errors.js';
import { err, ok, type Result } from '../types/result.js';
import type { Logger } from '../util/logger.js';

export const DEFAULT_MANIFEST_FILE = 'summary.json';

export interface AggregateOptions {
  plan: TestPlan;
  resultsDir: string;
  /** Defaults to `<resultsDir>/summary.json`. */
  manifestPath?: string;
  logger: Logger;
}

export interface RunMetadata {
  timestamp?: string;
  target?: string;
  manifestPath: string;
}

export interface AggregatedRun {
  resultSet: ResultSet;
  meta: RunMetadata;
  /** True when no usable manifest was found and raw artifacts alone were used. */
  degraded: boolean;
  warnings: string[];
}

interface CaseOutcome {
  testCase: TestCase;
  sample: MetricSample;
  artifactsFound: number;
  warnings: string[];
}

async function aggregateCase(
  testCase: TestCase,
  resultsDir: string,
  manifest: Manifest | undefined
): Promise<CaseOutcome> {
  const label = `${testCase.tool}/${testCase.scenario}`;
  const warnings: string[] = [];
  const profileSamples: MetricSample[] = [];
  let artifactsFound = 0;

  for (const ref of testCase.artifacts) {
    const outcome = await parseArtifact(resultsDir, ref);
    if (!outcome.found) {
      warnings.push(`${label}: ${outcome.error.message}`);
      continue;
    }
    artifactsFound += 1;
    for (const issue of outcome.issues) {
      warnings.push(`${label}: ${issue.message} in ${outcome.path}`);
    }
    profileSamples.push(outcome.sample);
  }

  const manifestSample = manifest?.entries.get(testCase.manifestKey) ?? EMPTY_SAMPLE;
  return {
    testCase,
    // Manifest wins per field; profiling artifacts fill what it lacks.
    sample: mergeSamples(manifestSample, ...profileSamples),
    artifactsFound,
    warnings,
  };
}

/**
 * Build the run's ResultSet from the manifest and every configured artifact.
 *
 * Cases are parsed independently (concurrently) and a failing case never
 * affects another; the ResultSet order comes from the plan, not from parse
 * completion. Fails only when there is neither a manifest nor any readable
 * artifact.
 */
export async function aggregateRun(
  options: AggregateOptions
): Promise<Result<AggregatedRun, MissingInputError>> {
  const { plan, resultsDir, logger } = options;
  const manifestPath =
    options.manifestPath ?? path.join(resultsDir, DEFAULT_MANIFEST_FILE);
  const warnings: string[] = [];
  const warn = (message: string): void => {
    warnings.push(message);
    logger.warn(message);
  };

  const loaded = await loadManifest(manifestPath);
  let manifest: Manifest | undefined;
  if (loaded.status === 'loaded') {
    manifest = loaded.manifest;
    logger.info(`Loaded manifest ${manifestPath}`);
    for (const issue of manifest.issues) {
      warn(`${issue.key}: ${issue.error.message} in ${manifestPath}`);
    }
  } else if (loaded.status === 'absent') {
    warn(
      `Manifest ${manifestPath} not found; continuing with raw artifacts only (degraded mode)`
    );
  } else {
    warn(`${loaded.error.message}; continuing with raw artifacts only (degraded mode)`);
  }

  const outcomes = await Promise.all(
    plan.cases.map((testCase) => aggregateCase(testCase, resultsDir, manifest))
  );

  const artifactsFound = outcomes.reduce(
    (total, outcome) => total + outcome.artifactsFound,
    0
  );
  if (!manifest && artifactsFound === 0) {
    return err(new MissingInputError(resultsDir, manifestPath));
  }

  for (const outcome of outcomes) {
    outcome.warnings.forEach(warn);
  }

  return ok({
    resultSet: ResultSet.build(
      plan,
      outcomes.map(({ testCase, sample }) => ({
        tool: testCase.tool,
        scenario: testCase.scenario,
        sample,
      }))
    ),
    meta: {
      timestamp: manifest?.timestamp,
      target: manifest?.target,
      manifestPath,
    },
    degraded: manifest === undefined,
    warnings,
  });
}
