import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import { createTempProject, getFixturePath, SAMPLE_PROJECT } from '../../helpers/fixtures.js';

describe('CLI analyze command', () => {
  let tempProject: ReturnType<typeof createTempProject>;
  let exitSpy: MockInstance<typeof process.exit>;
  let errorSpy: MockInstance<typeof console.error>;
  let logSpy: MockInstance<typeof console.log>;
  let warnSpy: MockInstance<typeof console.warn>;

  beforeEach(() => {
    vi.resetModules();
    tempProject = createTempProject(SAMPLE_PROJECT);
    exitSpy = vi.spyOn(process, 'exit').mockImplementation((code?: string | number | null) => {
      throw new Error(`process.exit(${String(code)})`);
    });
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    exitSpy.mockRestore();
    errorSpy.mockRestore();
    logSpy.mockRestore();
    warnSpy.mockRestore();
    tempProject.cleanup();
  });

  function printed(): string[] {
    return logSpy.mock.calls.map(c => String(c[0]));
  }

  async function run(...args: string[]): Promise<void> {
    const { analyzeCommand } = await import('../../../src/cli/commands/analyze.js');
    await analyzeCommand.parseAsync(args, { from: 'user' });
  }

  describe('text report', () => {
    it('prints the summary for a source tree', async () => {
      await run(tempProject.rootDir, '--format', 'text');

      const output = printed();
      expect(output[0]).toBe(`Analyzing ${tempProject.rootDir}...\n`);
      expect(output).toContain('Code Health Summary');
      expect(output).toContain('  Packages:   2');
      expect(output).toContain('  Structs:    1');
      expect(output).toContain('  Functions:  3');
      expect(output).toContain('Findings: 0 (0 critical, 0 warning)');
      expect(exitSpy).not.toHaveBeenCalled();
    });

    it('prints per-package lines and the duration when verbose', async () => {
      await run(tempProject.rootDir, '--format', 'text', '--verbose');

      const output = printed();
      expect(output).toContain('  src/store: Ca=0 Ce=1 I=1.00 depth=1 loc=16 funcs=2 structs=1');
      expect(output).toContain('  src/util: Ca=1 Ce=0 I=0.00 depth=0 loc=7 funcs=1 structs=0');
      expect(output.some(line => /^\nDuration: \d+ms$/.test(line))).toBe(true);
    });
  });

  describe('JSON report', () => {
    it('writes the report relative to the analyzed directory', async () => {
      await run(tempProject.rootDir, '--format', 'json', '--output', 'out/report.json');

      const reportPath = tempProject.getFilePath('out/report.json');
      expect(printed()).toContain(`Report written to ${reportPath}`);
      expect(printed()).not.toContain('Code Health Summary');

      const report: unknown = JSON.parse(fs.readFileSync(reportPath, 'utf-8'));
      expect(report).toMatchObject({ totalLoc: 23, findings: [], skippedDirectories: [] });
    });

    it('takes the format and output from the config file', async () => {
      tempProject.addFile('code-health.config.json', JSON.stringify({
        report: { format: 'both', output: 'health.json' },
      }));

      await run(tempProject.rootDir);

      expect(printed()).toContain(`Report written to ${tempProject.getFilePath('health.json')}`);
      expect(printed()).toContain('Code Health Summary');
    });
  });

  describe('stored facts', () => {
    it('analyzes a facts file instead of parsing sources', async () => {
      const factsPath = getFixturePath('facts', 'partial-facts.json');

      await run(tempProject.rootDir, '--facts', factsPath, '--format', 'text');

      expect(printed()[0]).toBe(`Analyzing ${path.resolve(factsPath)}...\n`);
      expect(printed()).toContain('  Packages:   2');
      expect(printed()).toContain('  Functions:  1');
    });
  });

  describe('errors', () => {
    it('prints the error and exits when the config file is missing', async () => {
      const configPath = tempProject.getFilePath('missing.json');

      await expect(run(tempProject.rootDir, '--config', configPath)).rejects.toThrow('process.exit(1)');

      expect(errorSpy).toHaveBeenCalledWith('Error:', `Config file not found: ${configPath}`);
    });

    it('prints the error and exits when the directory does not exist', async () => {
      const missing = tempProject.getFilePath('nope');

      await expect(run(missing, '--format', 'text')).rejects.toThrow('process.exit(1)');

      expect(errorSpy).toHaveBeenCalledWith('Error:', `Target path does not exist: ${missing}`);
    });
  });
});
