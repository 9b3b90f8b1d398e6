import { EMPTY_SAMPLE, type MetricSample } from './metric-sample.js';
import {
  caseKey,
  type Scenario,
  type TestPlan,
  type Tool,
} from './test-plan.js';

export interface ResultEntry {
  readonly tool: Tool;
  readonly scenario: Scenario;
  readonly sample: MetricSample;
}

export type SerializedResultEntry = {
  tool: string;
  scenario: string;
} & { [K in keyof MetricSample]: number | null };

/**
 * Read-only mapping (tool, scenario) → MetricSample for one report run.
 * Iteration order is always scenario-major, tool-minor, as configured.
 */
export class ResultSet {
  private readonly samples: ReadonlyMap<string, MetricSample>;

  private constructor(
    public readonly tools: readonly Tool[],
    public readonly scenarios: readonly Scenario[],
    samples: Map<string, MetricSample>
  ) {
    this.samples = samples;
    Object.freeze(this);
  }

  static build(
    plan: TestPlan,
    samples: Iterable<{ tool: string; scenario: string; sample: MetricSample }>
  ): ResultSet {
    const map = new Map<string, MetricSample>();
    for (const entry of samples) {
      map.set(caseKey(entry.tool, entry.scenario), entry.sample);
    }
    return new ResultSet(
      Object.freeze([...plan.tools]),
      Object.freeze([...plan.scenarios]),
      map
    );
  }

  /** Whether the pair was part of the configured plan. */
  has(tool: string, scenario: string): boolean {
    return this.samples.has(caseKey(tool, scenario));
  }

  /** Unconfigured pairs read as an all-absent sample. */
  get(tool: string, scenario: string): MetricSample {
    return this.samples.get(caseKey(tool, scenario)) ?? EMPTY_SAMPLE;
  }

  /** Configured pairs only, in fixed order. */
  entries(): ResultEntry[] {
    const entries: ResultEntry[] = [];
    for (const scenario of this.scenarios) {
      for (const tool of this.tools) {
        const sample = this.samples.get(caseKey(tool.id, scenario.key));
        if (sample) {
          entries.push({ tool, scenario, sample });
        }
      }
    }
    return entries;
  }

  get size(): number {
    return this.samples.size;
  }

  /** Absent fields serialize as `null` so they survive JSON encoding. */
  toJSON(): SerializedResultEntry[] {
    return this.entries().map(({ tool, scenario, sample }) => ({
      tool: tool.id,
      scenario: scenario.key,
      elapsedSeconds: sample.elapsedSeconds ?? null,
      peakMemoryKb: sample.peakMemoryKb ?? null,
      cpuPercent: sample.cpuPercent ?? null,
      openPortsFound: sample.openPortsFound ?? null,
    }));
  }
}
