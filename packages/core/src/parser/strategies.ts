import type { MalformedFieldError } from '../types/errors.js';
import { createSample, type MetricSample } from '../model/metric-sample.js';
import type { ArtifactFormat } from '../model/test-plan.js';
import {
  FieldCollector,
  leadingToken,
  parseCount,
  parsePercent,
  parseSeconds,
  trailingToken,
} from './fields.js';

export interface ParseOutcome {
  sample: MetricSample;
  issues: MalformedFieldError[];
}

export interface MetricParseStrategy {
  readonly format: ArtifactFormat;
  parse(text: string): ParseOutcome;
}

function finish(collector: FieldCollector): ParseOutcome {
  return {
    sample: createSample(collector.snapshot()),
    issues: [...collector.issues],
  };
}

/**
 * `/usr/bin/time -v` output. Each metric is read from the line carrying its
 * label, whatever else the artifact contains.
 */
export const timeVerboseStrategy: MetricParseStrategy = {
  format: 'time-verbose',
  parse(text) {
    const collector = new FieldCollector();
    for (const line of text.split(/\r?\n/)) {
      if (line.includes('Elapsed (wall clock) time')) {
        collector.set('elapsedSeconds', trailingToken(line), parseSeconds);
      } else if (line.includes('Maximum resident set size (kbytes)')) {
        collector.set('peakMemoryKb', trailingToken(line), parseCount);
      } else if (line.includes('Percent of CPU this job got')) {
        collector.set('cpuPercent', trailingToken(line), parsePercent);
      }
    }
    return finish(collector);
  },
};

const COMPACT_LINE_RE = /^\s*(Time|Memory|CPU):(.*)$/;

/**
 * `Time: %E / Memory: %M KB / CPU: %P` digest, one key per line.
 */
export const timeCompactStrategy: MetricParseStrategy = {
  format: 'time-compact',
  parse(text) {
    const collector = new FieldCollector();
    for (const line of text.split(/\r?\n/)) {
      const match = COMPACT_LINE_RE.exec(line);
      if (!match) {
        continue;
      }
      const [, key, rest = ''] = match;
      const token = leadingToken(rest);
      if (key === 'Time') {
        collector.set('elapsedSeconds', token, parseSeconds);
      } else if (key === 'Memory') {
        collector.set('peakMemoryKb', token, parseCount);
      } else {
        collector.set('cpuPercent', token, parsePercent);
      }
    }
    return finish(collector);
  },
};

const NMAP_PORT_LINE_RE = /^\d+\/(?:tcp|udp|sctp)\s+(\S+)/;
const NMAP_SCAN_MARKERS = [/^PORT\s+STATE\b/, /^Nmap done:/, /^Not shown:/];

/**
 * nmap `-oN` output. Counts ports in state `open`; a file without any scan
 * marker yields no count at all rather than zero.
 */
export const nmapNormalStrategy: MetricParseStrategy = {
  format: 'nmap-normal',
  parse(text) {
    const collector = new FieldCollector();
    let sawScan = false;
    let open = 0;
    for (const rawLine of text.split(/\r?\n/)) {
      const line = rawLine.trim();
      if (NMAP_SCAN_MARKERS.some((marker) => marker.test(line))) {
        sawScan = true;
      }
      const match = NMAP_PORT_LINE_RE.exec(line);
      if (match) {
        sawScan = true;
        if (match[1] === 'open') {
          open += 1;
        }
      }
    }
    if (sawScan) {
      collector.setNumber('openPortsFound', open);
    }
    return finish(collector);
  },
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Status document of the distributed scanner (`GET /scan/:id`).
 */
export const scanStatusStrategy: MetricParseStrategy = {
  format: 'scan-status',
  parse(text) {
    const collector = new FieldCollector();
    let document: unknown;
    try {
      document = JSON.parse(text);
    } catch {
      collector.reject('openPortsFound', text.slice(0, 40));
      return finish(collector);
    }
    if (!isRecord(document)) {
      return finish(collector);
    }

    const openPorts = document.open_ports;
    if (typeof openPorts === 'number') {
      collector.set('openPortsFound', String(openPorts), parseCount);
    } else if (Array.isArray(openPorts)) {
      collector.setNumber('openPortsFound', openPorts.length);
    }

    const createdAt = document.created_at;
    const completedAt = document.completed_at;
    if (typeof createdAt === 'string' && typeof completedAt === 'string') {
      const elapsedMs = Date.parse(completedAt) - Date.parse(createdAt);
      if (Number.isFinite(elapsedMs) && elapsedMs >= 0) {
        collector.setNumber('elapsedSeconds', elapsedMs / 1000);
      } else {
        collector.reject('elapsedSeconds', `${createdAt} → ${completedAt}`);
      }
    }
    return finish(collector);
  },
};

export const PARSE_STRATEGIES: Readonly<
  Record<ArtifactFormat, MetricParseStrategy>
> = {
  'time-verbose': timeVerboseStrategy,
  'time-compact': timeCompactStrategy,
  'nmap-normal': nmapNormalStrategy,
  'scan-status': scanStatusStrategy,
};

/**
 * Parse one artifact's text with the strategy selected by its format tag.
 */
export function parseMetricText(
  text: string,
  format: ArtifactFormat
): ParseOutcome {
  return PARSE_STRATEGIES[format].parse(text);
}
