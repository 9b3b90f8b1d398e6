/**
 * Feature comparison of the benchmarked scanners. Fixed content, independent
 * of measurements.
 */
export const CAPABILITY_TOOLS = ['Pentool', 'Nmap', 'Masscan'] as const;

export interface CapabilityRow {
  capability: string;
  support: readonly [boolean, boolean, boolean];
}

export const CAPABILITY_MATRIX: readonly CapabilityRow[] = [
  { capability: 'Port scanning', support: [true, true, true] },
  { capability: 'Service detection', support: [true, true, false] },
  { capability: 'REST API', support: [true, false, false] },
  { capability: 'Distributed architecture', support: [true, false, false] },
  { capability: 'Horizontal scaling', support: [true, false, false] },
  { capability: 'Asynchronous processing', support: [true, false, true] },
  { capability: 'Results stored in a database', support: [true, false, false] },
  { capability: 'Internet-scale scanning', support: [false, false, true] },
  { capability: 'OS detection', support: [false, true, false] },
  { capability: 'Scripting engine', support: [false, true, false] },
];

export function supportMark(supported: boolean): string {
  return supported ? '✓' : '✗';
}
