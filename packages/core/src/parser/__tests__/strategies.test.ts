import { describe, expect, it } from 'vitest';

import { ErrorCode } from '../../errors/codes.js';
import { createSample } from '../../model/metric-sample.js';
import {
  nmapNormalStrategy,
  parseMetricText,
  scanStatusStrategy,
  timeCompactStrategy,
  timeVerboseStrategy,
} from '../strategies.js';

const VERBOSE = [
  '\tCommand being timed: "nmap -p 1-100 127.0.0.1"',
  '\tUser time (seconds): 0.05',
  '\tSystem time (seconds): 0.02',
  '\tPercent of CPU this job got: 45%',
  '\tElapsed (wall clock) time (h:mm:ss or m:ss): 0:01.20',
  '\tMaximum resident set size (kbytes): 20480',
  '\tExit status: 0',
].join('\n');

describe('timeVerboseStrategy', () => {
  it('extracts time, memory and CPU from their labelled lines', () => {
    const { sample, issues } = timeVerboseStrategy.parse(VERBOSE);
    expect(sample.elapsedSeconds).toBeCloseTo(1.2, 10);
    expect(sample.peakMemoryKb).toBe(20480);
    expect(sample.cpuPercent).toBe(45);
    expect(sample.openPortsFound).toBeUndefined();
    expect(issues).toEqual([]);
  });

  it('keeps CPU values above 100', () => {
    const { sample } = timeVerboseStrategy.parse('Percent of CPU this job got: 180%');
    expect(sample.cpuPercent).toBe(180);
  });

  it('leaves a malformed field absent and reports it', () => {
    const { sample, issues } = timeVerboseStrategy.parse(
      'Maximum resident set size (kbytes): lots\nPercent of CPU this job got: 12%'
    );
    expect(sample.peakMemoryKb).toBeUndefined();
    expect(sample.cpuPercent).toBe(12);
    expect(issues).toHaveLength(1);
    expect(issues[0]?.errorCode).toBe(ErrorCode.MALFORMED_FIELD);
    expect(issues[0]?.message).toBe('Malformed value "lots" for peakMemoryKb');
  });

  it('keeps the first occurrence of a repeated label', () => {
    const { sample } = timeVerboseStrategy.parse(
      'Maximum resident set size (kbytes): 100\nMaximum resident set size (kbytes): 200'
    );
    expect(sample.peakMemoryKb).toBe(100);
  });

  it('yields an all-absent sample for unrelated text', () => {
    const { sample, issues } = timeVerboseStrategy.parse('Starting Nmap 7.94\n');
    expect(sample).toEqual(createSample());
    expect(issues).toEqual([]);
  });
});

describe('timeCompactStrategy', () => {
  it('reads the Time/Memory/CPU digest', () => {
    const { sample, issues } = timeCompactStrategy.parse(
      'Time: 0:02.50\nMemory: 10240 KB\nCPU: 30%\n'
    );
    expect(sample).toEqual(
      createSample({ elapsedSeconds: 2.5, peakMemoryKb: 10240, cpuPercent: 30 })
    );
    expect(issues).toEqual([]);
  });

  it('ignores lines that are not digest keys', () => {
    const { sample } = timeCompactStrategy.parse('Starting scan\nPORT STATE\nTime: 5.25');
    expect(sample.elapsedSeconds).toBe(5.25);
    expect(sample.peakMemoryKb).toBeUndefined();
  });

  it('reports an unparsable percentage', () => {
    const { sample, issues } = timeCompactStrategy.parse('CPU: ?%');
    expect(sample.cpuPercent).toBeUndefined();
    expect(issues.map((issue) => issue.context?.field)).toEqual(['cpuPercent']);
  });
});

describe('nmapNormalStrategy', () => {
  it('counts open ports only', () => {
    const text = [
      '# Nmap 7.94 scan initiated',
      'Nmap scan report for localhost (127.0.0.1)',
      'Not shown: 97 closed tcp ports (conn-refused)',
      'PORT     STATE    SERVICE',
      '22/tcp   open     ssh',
      '80/tcp   open     http',
      '443/tcp  filtered https',
      '',
      '# Nmap done: 1 IP address (1 host up) scanned in 0.05 seconds',
    ].join('\n');
    expect(nmapNormalStrategy.parse(text).sample.openPortsFound).toBe(2);
  });

  it('records zero when the scan ran but found nothing open', () => {
    const text = 'Not shown: 100 closed tcp ports\nNmap done: 1 IP address';
    expect(nmapNormalStrategy.parse(text).sample.openPortsFound).toBe(0);
  });

  it('leaves the count absent when no scan output is present', () => {
    expect(nmapNormalStrategy.parse('Time: 0:01.00').sample.openPortsFound).toBeUndefined();
  });
});

describe('scanStatusStrategy', () => {
  it('derives elapsed time and port count from the status document', () => {
    const { sample, issues } = scanStatusStrategy.parse(
      JSON.stringify({
        scan_id: 'abc',
        status: 'completed',
        open_ports: [22, 80, 443],
        created_at: '2024-05-01T10:00:00.000Z',
        completed_at: '2024-05-01T10:00:01.500Z',
      })
    );
    expect(sample.elapsedSeconds).toBe(1.5);
    expect(sample.openPortsFound).toBe(3);
    expect(issues).toEqual([]);
  });

  it('accepts a numeric open_ports count', () => {
    const { sample } = scanStatusStrategy.parse('{"open_ports": 4}');
    expect(sample.openPortsFound).toBe(4);
    expect(sample.elapsedSeconds).toBeUndefined();
  });

  it('rejects a completion time before the start time', () => {
    const { sample, issues } = scanStatusStrategy.parse(
      JSON.stringify({
        created_at: '2024-05-01T10:00:05Z',
        completed_at: '2024-05-01T10:00:00Z',
      })
    );
    expect(sample.elapsedSeconds).toBeUndefined();
    expect(issues.map((issue) => issue.context?.field)).toEqual(['elapsedSeconds']);
  });

  it('reports invalid JSON without throwing', () => {
    const { sample, issues } = scanStatusStrategy.parse('{not json');
    expect(sample).toEqual(createSample());
    expect(issues).toHaveLength(1);
  });
});

describe('parseMetricText', () => {
  it('dispatches on the format tag', () => {
    expect(parseMetricText('Time: 3.00', 'time-compact').sample.elapsedSeconds).toBe(3);
    expect(parseMetricText('Time: 3.00', 'time-verbose').sample.elapsedSeconds).toBeUndefined();
  });
});
