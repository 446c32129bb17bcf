import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { fileURLToPath } from 'url';
import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { parse } from 'yaml';
import { run } from '../src/cli.js';
import { USAGE } from '../src/cli-args.js';
import type { OutputDocument } from '../src/types.js';

const FIXTURE = fileURLToPath(new URL('../test/task.yaml', import.meta.url));

describe('run', () => {
  let dir: string;
  let configPath: string;
  let log: MockInstance<Parameters<typeof console.log>, void>;
  let errorLog: MockInstance<Parameters<typeof console.error>, void>;

  const errorLines = (): string[] => errorLog.mock.calls.map(call => call.map(String).join(' '));

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'crew-cover-cli-'));
    configPath = join(dir, 'config.yaml');
    log = vi.spyOn(console, 'log').mockImplementation(() => {});
    errorLog = vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('exits 2 with the usage on stderr for an unknown flag', () => {
    expect(run(['-x'], { configPath })).toBe(2);
    expect(errorLog).toHaveBeenLastCalledWith(USAGE);
    expect(log).not.toHaveBeenCalled();
  });

  it('exits 2 when a flag is missing its value', () => {
    expect(run(['-i'], { configPath })).toBe(2);
    expect(errorLog).toHaveBeenLastCalledWith(USAGE);
  });

  it('prints the usage and exits 0 for -h', () => {
    expect(run(['-h'], { configPath })).toBe(0);
    expect(log).toHaveBeenCalledWith(USAGE);
    expect(errorLog).not.toHaveBeenCalled();
  });

  it('warns about a missing input file and exits 1', () => {
    const input = join(dir, 'nope.yaml');
    const output = join(dir, 'result.yaml');

    expect(run(['-i', input, '-o', output], { configPath })).toBe(1);

    const lines = errorLines();
    expect(lines[0]).toContain(`Error: ${input} is not path to file`);
    expect(lines[lines.length - 1]).toContain('Fatal error:');
    expect(lines[lines.length - 1]).toContain('ENOENT');
    expect(existsSync(output)).toBe(false);
  });

  it('exits 1 on an invalid document', () => {
    const input = join(dir, 'bad.yaml');
    writeFileSync(input, 'Tasks: []\n');

    expect(run(['--in', input, '--out', join(dir, 'result.yaml')], { configPath })).toBe(1);
    expect(errorLines().some(line => line.includes('Invalid input document'))).toBe(true);
  });

  it('writes the result and exits 0', () => {
    const output = join(dir, 'result.yaml');

    expect(run(['-i', FIXTURE, `--out=${output}`], { configPath })).toBe(0);

    const logLines = log.mock.calls.map(call => call.map(String).join(' '));
    expect(logLines[0]).toContain('Input file');
    expect(logLines[0]).toContain(FIXTURE);
    expect(logLines[1]).toContain('Output file');
    expect(logLines[1]).toContain(output);

    const written: OutputDocument = parse(readFileSync(output, 'utf-8'));
    expect(written.Tasks.map(t => t.name)).toEqual(['One', 'Two', 'Three', 'Four']);
    expect(written.Tasks[2].teams).toEqual([
      { peoples: ['Petya'], price: 2500 },
      { peoples: ['Vitalya'], price: 3000 },
    ]);
  });

  it('takes paths from the config file when no flags are given', () => {
    const output = join(dir, 'from-config.yaml');
    writeFileSync(configPath, `paths:\n  input: ${FIXTURE}\n  output: ${output}\nreport:\n  enabled: false\n`);

    expect(run([], { configPath })).toBe(0);
    expect(existsSync(output)).toBe(true);
  });
});
