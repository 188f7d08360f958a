import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { z } from 'zod';
import { loadJsonFile, loadYamlFile } from '../src/datafile.js';

describe('data file loaders', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(tmpdir(), 'labor-mcp-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('parses and validates YAML', () => {
    const file = path.join(dir, 'series.yml');
    writeFileSync(file, '# comment\nB1: Second\nA1: First\n');

    const data = loadYamlFile(file, z.record(z.string()));

    expect(Object.entries(data)).toEqual([['B1', 'Second'], ['A1', 'First']]);
  });

  it('reports the path of an invalid JSON entry', () => {
    const file = path.join(dir, 'states.json');
    writeFileSync(file, JSON.stringify([{ fips: 39 }]));

    expect(() => loadJsonFile(file, z.array(z.object({ fips: z.string() })))).toThrow(
      `Invalid data file ${file} at 0.fips: Expected string, received number`
    );
  });

  it('reports a missing file', () => {
    expect(() => loadJsonFile(path.join(dir, 'missing.json'), z.unknown())).toThrow(/^Failed to read data file /);
  });
});
