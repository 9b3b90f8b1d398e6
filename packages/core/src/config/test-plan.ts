import { readFile } from 'node:fs/promises';

import AjvModule from 'ajv';

import {
  ARTIFACT_FORMATS,
  caseKey,
  defaultManifestKey,
  type ArtifactFormat,
  type TestCase,
  type TestPlan,
} from '../model/test-plan.js';
import { ConfigurationError, toError } from '../types/errors.js';

/**
 * The benchmark as captured by the harness: the distributed scanner and nmap
 * against the same target, nmap wrapped by `/usr/bin/time`.
 */
export const DEFAULT_TEST_PLAN: TestPlan = {
  tools: [
    { id: 'pentool', label: 'Pentool' },
    { id: 'nmap', label: 'Nmap' },
  ],
  scenarios: [
    { key: 'common_ports', label: 'Common ports (15)' },
    { key: 'port_range', label: 'Port range 1-100' },
    { key: 'service_detection', label: 'Service detection' },
  ],
  cases: [
    {
      tool: 'pentool',
      scenario: 'common_ports',
      manifestKey: 'pentool_common_ports',
      artifacts: [{ path: 'pentool_scan_results.json', format: 'scan-status' }],
    },
    {
      tool: 'nmap',
      scenario: 'common_ports',
      manifestKey: 'nmap_common_ports',
      artifacts: [
        { path: 'nmap_common_time.txt', format: 'time-compact' },
        { path: 'nmap_common.txt', format: 'nmap-normal' },
      ],
    },
    {
      tool: 'nmap',
      scenario: 'port_range',
      manifestKey: 'nmap_port_range_1_100',
      artifacts: [
        { path: 'nmap_range_time.txt', format: 'time-compact' },
        { path: 'nmap_range.txt', format: 'nmap-normal' },
      ],
    },
    {
      tool: 'nmap',
      scenario: 'service_detection',
      manifestKey: 'nmap_service_detection',
      artifacts: [{ path: 'nmap_service_time.txt', format: 'time-compact' }],
    },
  ],
  baselineTool: 'pentool',
};

/**
 * Layout of a profiling run: every nmap scan wrapped by `/usr/bin/time -v`,
 * one verbose report per scenario, localhost sweep included.
 */
export const PROFILE_TEST_PLAN: TestPlan = {
  tools: DEFAULT_TEST_PLAN.tools,
  scenarios: [
    { key: 'common_ports', label: 'Common ports (15)' },
    { key: 'port_range', label: 'Port range 1-1000' },
    { key: 'localhost', label: 'Localhost 1-1000' },
    { key: 'service_detection', label: 'Service detection' },
  ],
  cases: [
    {
      tool: 'pentool',
      scenario: 'common_ports',
      manifestKey: 'pentool_common_ports',
      artifacts: [{ path: 'pentool_common_response.json', format: 'scan-status' }],
    },
    {
      tool: 'nmap',
      scenario: 'common_ports',
      manifestKey: 'nmap_common_ports',
      artifacts: [{ path: 'nmap_common_metrics.txt', format: 'time-verbose' }],
    },
    {
      tool: 'nmap',
      scenario: 'port_range',
      manifestKey: 'nmap_port_range',
      artifacts: [{ path: 'nmap_range_metrics.txt', format: 'time-verbose' }],
    },
    {
      tool: 'nmap',
      scenario: 'localhost',
      manifestKey: 'nmap_localhost',
      artifacts: [{ path: 'nmap_localhost_metrics.txt', format: 'time-verbose' }],
    },
    {
      tool: 'nmap',
      scenario: 'service_detection',
      manifestKey: 'nmap_service_detection',
      artifacts: [{ path: 'nmap_service_metrics.txt', format: 'time-verbose' }],
    },
  ],
  baselineTool: 'pentool',
};

export const BUILTIN_TEST_PLANS = {
  digest: DEFAULT_TEST_PLAN,
  profile: PROFILE_TEST_PLAN,
} as const satisfies Record<string, TestPlan>;

export type BuiltinPlanName = keyof typeof BUILTIN_TEST_PLANS;

function isBuiltinPlanName(name: string): name is BuiltinPlanName {
  return Object.hasOwn(BUILTIN_TEST_PLANS, name);
}

export function getBuiltinTestPlan(name: string): TestPlan {
  if (!isBuiltinPlanName(name)) {
    throw new ConfigurationError(
      `Unknown built-in test plan "${name}" (expected one of: ${Object.keys(BUILTIN_TEST_PLANS).join(', ')}).`
    );
  }
  return BUILTIN_TEST_PLANS[name];
}

interface RawTestPlan {
  tools: Array<{ id: string; label?: string }>;
  scenarios: Array<{ key: string; label?: string }>;
  cases: Array<{
    tool: string;
    scenario: string;
    manifestKey?: string;
    artifacts?: Array<{ path: string; format: ArtifactFormat }>;
  }>;
  baselineTool?: string;
}

export const TEST_PLAN_SCHEMA = {
  $id: 'portbench/test-plan',
  type: 'object',
  required: ['tools', 'scenarios', 'cases'],
  additionalProperties: false,
  properties: {
    tools: {
      type: 'array',
      minItems: 1,
      items: {
        type: 'object',
        required: ['id'],
        additionalProperties: false,
        properties: {
          id: { type: 'string', minLength: 1 },
          label: { type: 'string' },
        },
      },
    },
    scenarios: {
      type: 'array',
      minItems: 1,
      items: {
        type: 'object',
        required: ['key'],
        additionalProperties: false,
        properties: {
          key: { type: 'string', minLength: 1 },
          label: { type: 'string' },
        },
      },
    },
    cases: {
      type: 'array',
      items: {
        type: 'object',
        required: ['tool', 'scenario'],
        additionalProperties: false,
        properties: {
          tool: { type: 'string' },
          scenario: { type: 'string' },
          manifestKey: { type: 'string' },
          artifacts: {
            type: 'array',
            items: {
              type: 'object',
              required: ['path', 'format'],
              additionalProperties: false,
              properties: {
                path: { type: 'string', minLength: 1 },
                format: { enum: [...ARTIFACT_FORMATS] },
              },
            },
          },
        },
      },
    },
    baselineTool: { type: 'string' },
  },
} as const;

const Ajv = AjvModule.default;
const ajv = new Ajv({ allErrors: true, strict: false });
const validatePlan = ajv.compile<RawTestPlan>(TEST_PLAN_SCHEMA);

function assertUnique(values: string[], what: string): void {
  const seen = new Set<string>();
  for (const value of values) {
    if (seen.has(value)) {
      throw new ConfigurationError(`Duplicate ${what} "${value}" in test plan.`);
    }
    seen.add(value);
  }
}

/**
 * Validate a parsed plan document and resolve its defaults. Scenario and tool
 * identity is fixed here and never changes afterwards.
 */
export function decodeTestPlan(raw: unknown): TestPlan {
  if (!validatePlan(raw)) {
    throw new ConfigurationError(
      `Invalid test plan: ${ajv.errorsText(validatePlan.errors, { dataVar: 'plan' })}`
    );
  }

  const toolIds = raw.tools.map((tool) => tool.id);
  const scenarioKeys = raw.scenarios.map((scenario) => scenario.key);
  assertUnique(toolIds, 'tool id');
  assertUnique(scenarioKeys, 'scenario key');
  assertUnique(
    raw.cases.map((entry) => caseKey(entry.tool, entry.scenario)),
    'case'
  );

  const cases: TestCase[] = raw.cases.map((entry) => {
    if (!toolIds.includes(entry.tool)) {
      throw new ConfigurationError(
        `Case references unknown tool "${entry.tool}".`,
        { tool: entry.tool }
      );
    }
    if (!scenarioKeys.includes(entry.scenario)) {
      throw new ConfigurationError(
        `Case references unknown scenario "${entry.scenario}".`,
        { scenario: entry.scenario }
      );
    }
    return {
      tool: entry.tool,
      scenario: entry.scenario,
      manifestKey:
        entry.manifestKey ?? defaultManifestKey(entry.tool, entry.scenario),
      artifacts: entry.artifacts ?? [],
    };
  });

  const baselineTool = raw.baselineTool ?? toolIds[0];
  if (baselineTool === undefined || !toolIds.includes(baselineTool)) {
    throw new ConfigurationError(
      `Baseline tool "${String(baselineTool)}" is not one of the configured tools.`
    );
  }

  return {
    tools: raw.tools.map((tool) => ({ id: tool.id, label: tool.label ?? tool.id })),
    scenarios: raw.scenarios.map((scenario) => ({
      key: scenario.key,
      label: scenario.label ?? scenario.key,
    })),
    cases,
    baselineTool,
  };
}

export async function loadTestPlan(filePath: string): Promise<TestPlan> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(filePath, 'utf8'));
  } catch (error) {
    throw new ConfigurationError(
      `Cannot read test plan ${filePath}: ${toError(error).message}`,
      { path: filePath }
    );
  }
  return decodeTestPlan(raw);
}
