import { readFile } from 'node:fs/promises';

import AjvModule from 'ajv';

import { createSample, type MetricSample } from '../model/metric-sample.js';
import { MalformedFieldError, ManifestError, toError } from '../types/errors.js';
import { err, ok, type Result } from '../types/result.js';

/**
 * Summary written by the benchmark harness next to the raw artifacts.
 */
export interface RawManifest {
  timestamp: string;
  target: string;
  /** Entries are decoded one field at a time, see `decodeManifestEntry`. */
  tests: Record<string, unknown>;
}

/** A manifest field that was present but unusable. */
export interface ManifestIssue {
  key: string;
  error: MalformedFieldError;
}

export interface Manifest {
  readonly path: string;
  readonly timestamp: string;
  readonly target: string;
  readonly entries: ReadonlyMap<string, MetricSample>;
  readonly issues: readonly ManifestIssue[];
}

export const MANIFEST_SCHEMA = {
  $id: 'portbench/manifest',
  type: 'object',
  required: ['timestamp', 'target', 'tests'],
  properties: {
    timestamp: { type: 'string' },
    target: { type: 'string' },
    tests: { type: 'object' },
  },
} as const;

// ajv is CommonJS; under NodeNext its class is the `default` export property
const Ajv = AjvModule.default;
const ajv = new Ajv({ allErrors: true, strict: false });
const validateManifest = ajv.compile<RawManifest>(MANIFEST_SCHEMA);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const isDuration = (value: number): boolean => Number.isFinite(value) && value >= 0;
const isCount = (value: number): boolean => Number.isInteger(value) && value >= 0;

/**
 * One manifest entry as a sample: only time and open-port count are carried.
 * A field with an unusable value stays absent and is reported as an issue;
 * the entry's other fields are kept.
 */
export function decodeManifestEntry(entry: unknown): {
  sample: MetricSample;
  issues: MalformedFieldError[];
} {
  if (!isRecord(entry)) {
    return {
      sample: createSample(),
      issues: [new MalformedFieldError('entry', JSON.stringify(entry))],
    };
  }
  const issues: MalformedFieldError[] = [];
  const field = (name: string, accept: (value: number) => boolean): number | undefined => {
    const value = entry[name];
    if (value === undefined) {
      return undefined;
    }
    if (typeof value === 'number' && accept(value)) {
      return value;
    }
    issues.push(new MalformedFieldError(name, JSON.stringify(value)));
    return undefined;
  };
  const timeMs = field('time_ms', isDuration);
  return {
    sample: createSample({
      elapsedSeconds: timeMs === undefined ? undefined : timeMs / 1000,
      openPortsFound: field('open_ports', isCount),
    }),
    issues,
  };
}

export function decodeManifest(
  raw: unknown,
  sourcePath: string
): Result<Manifest, ManifestError> {
  if (!validateManifest(raw)) {
    const reason = ajv.errorsText(validateManifest.errors, {
      dataVar: 'manifest',
    });
    return err(new ManifestError(sourcePath, reason));
  }
  const entries = new Map<string, MetricSample>();
  const issues: ManifestIssue[] = [];
  for (const [key, entry] of Object.entries(raw.tests)) {
    const decoded = decodeManifestEntry(entry);
    entries.set(key, decoded.sample);
    issues.push(...decoded.issues.map((error) => ({ key, error })));
  }
  return ok({
    path: sourcePath,
    timestamp: raw.timestamp,
    target: raw.target,
    entries,
    issues,
  });
}

export type ManifestLoadResult =
  | { status: 'loaded'; manifest: Manifest }
  | { status: 'absent'; path: string }
  | { status: 'invalid'; error: ManifestError };

/**
 * Read the manifest file. Absence and invalid content are both reported to
 * the caller, which falls back to raw artifacts.
 */
export async function loadManifest(filePath: string): Promise<ManifestLoadResult> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf8');
  } catch {
    return { status: 'absent', path: filePath };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    return {
      status: 'invalid',
      error: new ManifestError(filePath, 'not valid JSON', toError(error)),
    };
  }

  const decoded = decodeManifest(raw, filePath);
  return decoded.ok
    ? { status: 'loaded', manifest: decoded.value }
    : { status: 'invalid', error: decoded.error };
}
