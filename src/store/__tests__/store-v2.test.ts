/**
 * Tests for the v2 Record Store
 *
 * Tests cover:
 * - destination layout: service/pillar directories, spaces stripped, cross-service fallback
 * - records without GUID, or whose file cannot be written, are skipped and reported
 * - reruns without overwrite report a conflict per record and write nothing
 * - reruns with overwrite replace the file at its new location and prune stale directories
 * - json/yml formats and the unsupported-format configuration error
 *
 * Each test works in its own temporary output directory.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import fg from 'fast-glob';
import { parse as parseYaml } from 'yaml';
import {
  storeV2,
  resolveRecordDirectory,
  findExistingRecordFile,
  UnsupportedFormatError,
} from '../index.js';
import type { V2Record } from '../../checklist/types/index.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function makeRecord(overrides: Partial<V2Record> = {}): V2Record {
  return {
    guid: 'rec-001',
    title: 'Enable zone redundancy',
    labels: { area: 'Reliability' },
    queries: [],
    links: [],
    resourceTypes: [],
    ...overrides,
  };
}

/** All files under a directory, relative, sorted */
function listFiles(dir: string): string[] {
  return fg.sync('**/*', { cwd: dir, onlyFiles: true }).sort();
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('storeV2', () => {
  let workDir: string;
  let outputRoot: string;

  beforeEach(() => {
    workDir = mkdtempSync(join(tmpdir(), 'store-v2-'));
    outputRoot = join(workDir, 'v2', 'recos');
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(workDir, { recursive: true, force: true });
  });

  describe('layout', () => {
    it('creates the output root including parents', () => {
      storeV2(outputRoot, []);
      expect(existsSync(outputRoot)).toBe(true);
    });

    it('writes into service and pillar directories with spaces removed', () => {
      const result = storeV2(outputRoot, [
        makeRecord({ service: 'Virtual Machines', waf: 'Operational Excellence' }),
      ]);

      const expected = join(outputRoot, 'VirtualMachines', 'OperationalExcellence', 'rec-001.yaml');
      expect(result.written).toEqual([expected]);
      expect(existsSync(expected)).toBe(true);
    });

    it('uses cross-service for records without a service', () => {
      storeV2(outputRoot, [makeRecord({ waf: 'Security' })]);
      expect(listFiles(outputRoot)).toEqual(['cross-service/Security/rec-001.yaml']);
    });

    it('writes directly into the service directory without a pillar', () => {
      storeV2(outputRoot, [makeRecord({ service: 'AKS' })]);
      expect(listFiles(outputRoot)).toEqual(['AKS/rec-001.yaml']);
    });
  });

  describe('records without GUID', () => {
    it('skips and reports them, storing the rest', () => {
      const { guid: _omitted, ...orphan } = makeRecord({ title: 'Orphan recommendation' });

      const result = storeV2(outputRoot, [orphan, makeRecord({ guid: 'rec-002' })]);

      expect(result.skipped).toBe(1);
      expect(listFiles(outputRoot)).toEqual(['cross-service/rec-002.yaml']);
      expect(console.error).toHaveBeenCalledWith(
        'ERROR: No GUID found in recommendation, skipping',
        'Orphan recommendation',
      );
    });

    it('never produces a file for them', () => {
      const { guid: _omitted, ...orphan } = makeRecord();

      storeV2(outputRoot, [orphan], { overwrite: true });

      expect(listFiles(outputRoot)).toEqual([]);
    });
  });

  describe('write failures', () => {
    it('reports the failing record and stores the rest', () => {
      const result = storeV2(outputRoot, [makeRecord({ guid: 'x/y' }), makeRecord({ guid: 'ok' })]);

      expect(result.written).toEqual([join(outputRoot, 'cross-service', 'ok.yaml')]);
      expect(result.skipped).toBe(1);
      expect(listFiles(outputRoot)).toEqual(['cross-service/ok.yaml']);
      expect(console.error).toHaveBeenCalledWith(
        'ERROR: Error when storing recommendation in',
        join(outputRoot, 'cross-service', 'x/y.yaml'),
        ':',
        expect.stringContaining('ENOENT'),
      );
    });
  });

  describe('reruns without overwrite', () => {
    it('reports a conflict for every record and writes no duplicates', () => {
      const records = [
        makeRecord({ guid: 'a-1', service: 'VM' }),
        makeRecord({ guid: 'b-2', service: 'VM', waf: 'Security' }),
      ];
      storeV2(outputRoot, records);
      const before = readFileSync(join(outputRoot, 'VM', 'a-1.yaml'), 'utf-8');

      const second = storeV2(outputRoot, [
        makeRecord({ guid: 'a-1', service: 'Storage', title: 'Changed' }),
        records[1],
      ]);

      expect(second.written).toEqual([]);
      expect(second.conflicts).toEqual([
        join(outputRoot, 'VM', 'a-1.yaml'),
        join(outputRoot, 'VM', 'Security', 'b-2.yaml'),
      ]);
      expect(console.error).toHaveBeenCalledWith(
        `ERROR: File ${join(outputRoot, 'VM', 'a-1.yaml')} already exists for recommendation, skipping`,
      );
      expect(readFileSync(join(outputRoot, 'VM', 'a-1.yaml'), 'utf-8')).toBe(before);
      expect(listFiles(outputRoot)).toEqual(['VM/Security/b-2.yaml', 'VM/a-1.yaml']);
      // Target directory is created before the conflict check
      expect(existsSync(join(outputRoot, 'Storage'))).toBe(true);
    });

    it('treats a repeated GUID within one batch as a conflict', () => {
      const result = storeV2(outputRoot, [
        makeRecord({ title: 'First' }),
        makeRecord({ title: 'Second' }),
      ]);

      expect(result.written).toHaveLength(1);
      expect(result.conflicts).toHaveLength(1);
      const stored = parseYaml(readFileSync(join(outputRoot, 'cross-service', 'rec-001.yaml'), 'utf-8'));
      expect(stored.title).toBe('First');
    });
  });

  describe('reruns with overwrite', () => {
    it('moves the record to its new location and prunes stale directories', () => {
      storeV2(outputRoot, [makeRecord({ service: 'Virtual Machines', waf: 'Security' })]);

      const result = storeV2(
        outputRoot,
        [makeRecord({ service: 'Compute', title: 'Updated title' })],
        { overwrite: true },
      );

      expect(result.conflicts).toEqual([]);
      expect(listFiles(outputRoot)).toEqual(['Compute/rec-001.yaml']);
      expect(existsSync(join(outputRoot, 'VirtualMachines'))).toBe(false);
      const stored = parseYaml(readFileSync(join(outputRoot, 'Compute', 'rec-001.yaml'), 'utf-8'));
      expect(stored.title).toBe('Updated title');
    });

    it('leaves exactly one file per GUID after two runs', () => {
      const records = [
        makeRecord({ guid: 'a-1', service: 'VM' }),
        makeRecord({ guid: 'b-2', service: 'VM', waf: 'Cost Optimization' }),
      ];

      storeV2(outputRoot, records, { overwrite: true });
      storeV2(outputRoot, records, { overwrite: true });

      expect(listFiles(outputRoot)).toEqual(['VM/CostOptimization/b-2.yaml', 'VM/a-1.yaml']);
    });

    it('keeps directories that still hold unrelated files', () => {
      mkdirSync(join(outputRoot, 'Legacy'), { recursive: true });
      writeFileSync(join(outputRoot, 'Legacy', 'README.md'), '# legacy\n');
      mkdirSync(join(outputRoot, 'Empty', 'Nested'), { recursive: true });

      storeV2(outputRoot, [makeRecord()], { overwrite: true });

      expect(listFiles(outputRoot)).toEqual(['Legacy/README.md', 'cross-service/rec-001.yaml']);
      expect(existsSync(join(outputRoot, 'Empty'))).toBe(false);
      expect(existsSync(outputRoot)).toBe(true);
    });

    it('does not prune directories when overwrite is off', () => {
      mkdirSync(join(outputRoot, 'Empty'), { recursive: true });

      storeV2(outputRoot, [makeRecord()]);

      expect(existsSync(join(outputRoot, 'Empty'))).toBe(true);
    });
  });

  describe('formats', () => {
    it('writes compact JSON with the .json extension', () => {
      const record = makeRecord({ service: 'VM', queries: { arg: 'resources' } });

      storeV2(outputRoot, [record], { format: 'json' });

      expect(readFileSync(join(outputRoot, 'VM', 'rec-001.json'), 'utf-8')).toBe(JSON.stringify(record));
    });

    it('writes yml as .yaml files', () => {
      storeV2(outputRoot, [makeRecord()], { format: 'yml' });
      expect(listFiles(outputRoot)).toEqual(['cross-service/rec-001.yaml']);
    });

    it('detects existing files by extension only', () => {
      storeV2(outputRoot, [makeRecord()], { format: 'json' });
      const result = storeV2(outputRoot, [makeRecord()], { format: 'yaml' });

      expect(result.conflicts).toEqual([]);
      expect(listFiles(outputRoot)).toEqual(['cross-service/rec-001.json', 'cross-service/rec-001.yaml']);
    });

    it('throws before writing anything for an unsupported format', () => {
      expect(() => storeV2(outputRoot, [makeRecord()], { format: 'xml' })).toThrow(UnsupportedFormatError);
      expect(() => storeV2(outputRoot, [makeRecord()], { format: 'xml' })).toThrow(
        'Unsupported output format: xml',
      );
      expect(existsSync(outputRoot)).toBe(false);
    });
  });

  describe('verbose', () => {
    it('logs each stored file', () => {
      storeV2(outputRoot, [makeRecord()], { verbose: true, overwrite: true });

      expect(console.log).toHaveBeenCalledWith('DEBUG: Storing v2 objects in folder', outputRoot);
      expect(console.log).toHaveBeenCalledWith(
        'DEBUG: Stored YAML recommendation in',
        join(outputRoot, 'cross-service', 'rec-001.yaml'),
      );
      expect(console.log).toHaveBeenCalledWith('DEBUG: Removing empty directories in output folder', outputRoot);
    });
  });
});

// ---------------------------------------------------------------------------
// Path helpers
// ---------------------------------------------------------------------------

describe('resolveRecordDirectory', () => {
  it('strips only spaces from directory names', () => {
    expect(resolveRecordDirectory('/out', makeRecord({ service: 'Azure Kubernetes Service', waf: 'Performance Efficiency' })))
      .toBe(join('/out', 'AzureKubernetesService', 'PerformanceEfficiency'));
  });

  it('falls back to cross-service', () => {
    expect(resolveRecordDirectory('/out', makeRecord())).toBe(join('/out', 'cross-service'));
  });
});

describe('findExistingRecordFile', () => {
  let outputRoot: string;

  beforeEach(() => {
    outputRoot = mkdtempSync(join(tmpdir(), 'find-existing-'));
  });

  afterEach(() => {
    rmSync(outputRoot, { recursive: true, force: true });
  });

  it('finds a file at any depth', () => {
    mkdirSync(join(outputRoot, 'A', 'B'), { recursive: true });
    writeFileSync(join(outputRoot, 'A', 'B', 'g-1.yaml'), 'guid: g-1\n');

    expect(findExistingRecordFile(outputRoot, 'g-1.yaml')).toBe(join(outputRoot, 'A', 'B', 'g-1.yaml'));
  });

  it('returns null when nothing matches', () => {
    writeFileSync(join(outputRoot, 'g-10.yaml'), 'guid: g-10\n');
    expect(findExistingRecordFile(outputRoot, 'g-1.yaml')).toBeNull();
  });

  it('treats glob characters in the GUID literally', () => {
    writeFileSync(join(outputRoot, 'g-1.yaml'), 'guid: g-1\n');
    expect(findExistingRecordFile(outputRoot, 'g-*.yaml')).toBeNull();
  });
});
