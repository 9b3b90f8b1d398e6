/**
 * One measurement set for one (tool, scenario) pair.
 *
 * Every field is a required key whose value may be `undefined`: absence is
 * stated explicitly and never stands in for a measured zero.
 */
export interface MetricSample {
  readonly elapsedSeconds: number | undefined;
  readonly peakMemoryKb: number | undefined;
  /** May exceed 100 for multi-core processes; never clamped. */
  readonly cpuPercent: number | undefined;
  readonly openPortsFound: number | undefined;
}

export type MetricField = keyof MetricSample;

export const METRIC_FIELDS: readonly MetricField[] = [
  'elapsedSeconds',
  'peakMemoryKb',
  'cpuPercent',
  'openPortsFound',
];

export function createSample(fields: Partial<MetricSample> = {}): MetricSample {
  return Object.freeze({
    elapsedSeconds: fields.elapsedSeconds,
    peakMemoryKb: fields.peakMemoryKb,
    cpuPercent: fields.cpuPercent,
    openPortsFound: fields.openPortsFound,
  });
}

export const EMPTY_SAMPLE: MetricSample = createSample();

/**
 * Field-by-field merge: for each field the first source that carries a value
 * wins. Later sources only fill the gaps.
 */
export function mergeSamples(...sources: MetricSample[]): MetricSample {
  const merged: Partial<Record<MetricField, number>> = {};
  for (const field of METRIC_FIELDS) {
    for (const source of sources) {
      const value = source[field];
      if (value !== undefined) {
        merged[field] = value;
        break;
      }
    }
  }
  return createSample(merged);
}
