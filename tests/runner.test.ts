import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { fileURLToPath } from 'url';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { parse } from 'yaml';
import { runAssignment } from '../src/runner.js';
import { InputSchemaError } from '../src/errors.js';
import type { OutputDocument } from '../src/types.js';

const FIXTURE = fileURLToPath(new URL('../test/task.yaml', import.meta.url));

describe('runAssignment', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'crew-cover-run-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('writes teams for every task in input order', () => {
    const output = join(dir, 'result.yaml');

    const tasks = runAssignment({ input: FIXTURE, output });
    const written: OutputDocument = parse(readFileSync(output, 'utf-8'));

    expect(tasks.map(t => t.name)).toEqual(['One', 'Two', 'Three', 'Four']);
    expect(written.Tasks.map(t => t.name)).toEqual(['One', 'Two', 'Three', 'Four']);
    expect(written.Tasks[0].teams[0]).toEqual({ peoples: ['John', 'Justin', 'Petya'], price: 5300 });
    expect(written.Tasks[0].teams).toHaveLength(8);
    expect(written.Tasks[1].teams.map(t => t.price)).toEqual([2800, 6700, 8400]);
    expect(written.Tasks[2].teams).toEqual([
      { peoples: ['Petya'], price: 2500 },
      { peoples: ['Vitalya'], price: 3000 },
    ]);
    expect(written.Tasks[3].teams).toEqual([]);
  });

  it('aborts on an invalid document without writing output', () => {
    const input = join(dir, 'bad.yaml');
    const output = join(dir, 'result.yaml');
    writeFileSync(input, 'Tasks:\n  - name: One\nPeoples: []\n');

    expect(() => runAssignment({ input, output })).toThrow(InputSchemaError);
    expect(() => readFileSync(output, 'utf-8')).toThrow(/ENOENT/);
  });
});
