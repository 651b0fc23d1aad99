import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { run } from '../cli';

const yamlFixture = path.join(__dirname, 'fixtures', 'example_measurement.yaml');

describe('cli', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'cosmic-cfp-'));
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('generates a report and inspects it', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const output = path.join(dir, 'out.xlsx');

    expect(await run([yamlFixture, '-o', output, '--parser', 'builtin'])).toBe(0);
    expect(log).toHaveBeenCalledWith(`Excel report generated at: ${output}`);
    expect(fs.existsSync(output)).toBe(true);

    log.mockClear();
    expect(await run(['inspect', output])).toBe(0);
    expect(log.mock.calls.map(call => call[0])).toEqual([
      'Summary: 4 rows',
      'Functional Processes: 3 rows',
      'Data Movements: 9 rows',
    ]);
  });

  it('rejects an unknown parser', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    expect(await run([yamlFixture, '--parser', 'fast'])).toBe(1);
    expect(error).toHaveBeenCalledWith("Unknown parser 'fast'. Expected one of: auto, builtin, library.");
  });

  it('prints the error for a missing configuration', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const missing = path.join(dir, 'none.yaml');
    expect(await run([missing, '-o', path.join(dir, 'out.xlsx')])).toBe(1);
    expect(error).toHaveBeenCalledWith(`File '${missing}' does not exist.`);
  });

  it('prints usage without arguments', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    expect(await run([])).toBe(1);
    expect(String(log.mock.calls[0][0])).toContain('Usage:');
  });
});
