export type ArtifactFormat =
  | 'time-verbose'
  | 'time-compact'
  | 'nmap-normal'
  | 'scan-status';

export const ARTIFACT_FORMATS: readonly ArtifactFormat[] = [
  'time-verbose',
  'time-compact',
  'nmap-normal',
  'scan-status',
];

export interface Tool {
  readonly id: string;
  readonly label: string;
}

export interface Scenario {
  readonly key: string;
  readonly label: string;
}

export interface ArtifactRef {
  /** Relative to the results directory unless absolute. */
  readonly path: string;
  readonly format: ArtifactFormat;
}

export interface TestCase {
  readonly tool: string;
  readonly scenario: string;
  /** Merged in order; the first artifact providing a field wins. */
  readonly artifacts: readonly ArtifactRef[];
  /** Key of this case in the manifest `tests` map. */
  readonly manifestKey: string;
}

export interface TestPlan {
  readonly tools: readonly Tool[];
  readonly scenarios: readonly Scenario[];
  readonly cases: readonly TestCase[];
  /** Tool whose elapsed time is compared against the others. */
  readonly baselineTool: string;
}

export function caseKey(tool: string, scenario: string): string {
  return `${tool}::${scenario}`;
}

export function defaultManifestKey(tool: string, scenario: string): string {
  return `${tool}_${scenario}`;
}
