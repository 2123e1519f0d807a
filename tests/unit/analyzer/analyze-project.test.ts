import { describe, it, expect } from 'vitest';
import { analyzePackage, analyzeProject, AnalysisAbortedError } from '../../../src/analyzer/index.js';
import { getAnalysisSettings } from '../../../src/config/loader.js';
import { fn, method, pkg, project, reads, struct, MODULE_PATH } from '../../helpers/facts.js';

const settings = getAnalysisSettings();

function sampleProject() {
  return project([
    pkg('', {
      imports: [`${MODULE_PATH}/store`, 'node:fs'],
      files: [{ filePath: 'main.ts', lineCount: 20 }],
      functions: [fn('main', { bodyLineCount: 10, decisionPoints: { ifStatements: 1 } })],
    }),
    pkg('store', {
      files: [{ filePath: 'store/a.ts', lineCount: 30 }, { filePath: 'store/b.ts', lineCount: 12 }],
      structs: [struct('Counter', ['count'], [
        method('Counter', 'add', { fieldUsage: { count: 3 } }),
        method('Counter', 'value', { fieldUsage: reads('count') }),
      ])],
      functions: [
        fn('Counter.add', { bodyLineCount: 4 }),
        fn('Counter.value', { bodyLineCount: 2, callees: [] }),
      ],
    }),
  ], ['broken']);
}

describe('analyzeProject', () => {
  it('should combine coupling, complexity and cohesion per package', () => {
    const report = analyzeProject(sampleProject(), settings);

    expect(report.packages.map(p => p.importPath)).toEqual([MODULE_PATH, `${MODULE_PATH}/store`]);

    const [root, store] = report.packages;
    expect(root).toMatchObject({
      name: 'shop',
      afferent: 0,
      efferent: 1,
      instability: 1,
      dependencyDepth: 1,
      inCycle: false,
      totalLoc: 20,
      avgFuncLoc: 10,
      funcCount: 1,
      fileCount: 1,
    });
    expect(root?.functions[0]?.complexity).toBe(2);

    expect(store).toMatchObject({
      name: 'store',
      afferent: 1,
      efferent: 0,
      instability: 0,
      dependencyDepth: 0,
      totalLoc: 42,
      avgFuncLoc: 3,
      funcCount: 2,
      fileCount: 2,
    });
    expect(store?.structs[0]?.lcom4Score).toBe(1);
    expect(store?.structs[0]?.methodClusters).toBeNull();
    expect(store?.structs[0]?.fieldClusters).toBeNull();
  });

  it('should total lines and carry skipped directories', () => {
    const report = analyzeProject(sampleProject(), settings);

    expect(report.totalLoc).toBe(62);
    expect(report.skippedDirectories).toEqual(['broken']);
    expect(report.findings).toEqual([]);
  });

  it('should produce identical reports for identical facts', () => {
    const facts = sampleProject();

    expect(analyzeProject(facts, settings)).toEqual(analyzeProject(facts, settings));
  });

  it('should handle a project without packages', () => {
    const report = analyzeProject(project([]), settings);

    expect(report).toEqual({ findings: [], packages: [], totalLoc: 0, skippedDirectories: [] });
  });

  it('should stop with AnalysisAbortedError when the signal is aborted', () => {
    const controller = new AbortController();
    controller.abort(new Error('stop requested'));

    expect(() => analyzeProject(sampleProject(), settings, { signal: controller.signal }))
      .toThrow('Analysis aborted after 0 package(s): stop requested');

    try {
      analyzeProject(sampleProject(), settings, { signal: controller.signal });
    } catch (error) {
      expect(error).toBeInstanceOf(AnalysisAbortedError);
      expect(error instanceof AnalysisAbortedError && error.completedPackages).toBe(0);
    }
  });
});

describe('analyzePackage', () => {
  it('should default coupling metrics to zero when the package has none', () => {
    const result = analyzePackage(pkg('lonely'), MODULE_PATH, undefined, settings);

    expect(result).toMatchObject({
      afferent: 0,
      efferent: 0,
      instability: 0,
      dependencyDepth: 0,
      inCycle: false,
      avgFuncLoc: 0,
      funcCount: 0,
      totalLoc: 0,
    });
  });
});
