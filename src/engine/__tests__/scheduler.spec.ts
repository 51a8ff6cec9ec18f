import fs from 'fs';
import path from 'path';

import { UnknownModuleKindError } from '../errors';
import { ModuleKind, TargetSpec } from '../types';
import { createTempDir, createTestWorkspace, defineKind, removeTempDir, writeAction, writeDeclaration } from './fixtures';

describe('Scheduler.scan', () => {
  let root: string;
  let labDir: string;
  let kinds: ModuleKind[];

  beforeEach(() => {
    root = createTempDir();
    labDir = writeDeclaration(path.join(root, 'Lab'));
    kinds = [
      defineKind(
        'Lab',
        (): TargetSpec[] => [
          { name: 'A', path: 'a.out', action: writeAction(), parallelizable: 'cpu' },
          { name: 'B', path: 'b.out', action: writeAction(), parallelizable: 'io' },
          { name: 'C', path: 'c.out', action: writeAction(), depends: { a: 'A', b: 'B' }, parallelizable: 'cpu' },
        ],
        true
      ),
      defineKind('Sub', (context): TargetSpec[] => [
        { name: 'S', path: 's.out', action: writeAction(), depends: { a: context.requireParent().target('A') } },
      ]),
      defineKind('Bad', () => {
        throw new Error('bad settings');
      }),
      defineKind(
        'Data',
        (): TargetSpec[] => [
          { name: 'raw', path: 'raw.csv' },
          { name: 'clean', path: 'clean.csv', action: writeAction(), depends: { raw: 'raw' } },
          { name: 'other', path: 'other.txt', action: writeAction() },
        ],
        true
      ),
    ];
  });

  afterEach(() => {
    removeTempDir(root);
  });

  const invocation = (modulePath: string, targetName: string, reason = 'stale', force = false) => ({
    targetId: `${modulePath}#${targetName}`,
    modulePath,
    targetName,
    force,
    reason,
  });

  it('layers stale targets by depth and batches them by class', () => {
    const workspace = createTestWorkspace(root, kinds);

    const plan = workspace.scan(labDir);

    expect(plan.layers).toEqual([
      {
        depth: 0,
        batches: [
          { parallelizable: 'cpu', invocations: [invocation(labDir, 'A')] },
          { parallelizable: 'io', invocations: [invocation(labDir, 'B')] },
        ],
      },
      { depth: 1, batches: [{ parallelizable: 'cpu', invocations: [invocation(labDir, 'C')] }] },
    ]);
    expect(plan.stats).toEqual({
      modules: 1,
      targets: 3,
      scheduled: 3,
      upToDate: 0,
      blocked: 0,
      layers: 2,
      batches: 3,
    });
  });

  it('schedules nothing once everything is made', async () => {
    const workspace = createTestWorkspace(root, kinds);
    await workspace.engine.make(workspace.resolve(labDir).target('C'));

    const plan = workspace.scan(labDir);

    expect(plan.layers).toEqual([]);
    expect(plan.stats.upToDate).toBe(3);
  });

  it('schedules the dependents of a stale target', async () => {
    const workspace = createTestWorkspace(root, kinds);
    const module = workspace.resolve(labDir);
    await workspace.engine.make(module.target('C'));
    workspace.engine.clean(module, ['A']);

    const plan = workspace.scan(labDir);

    expect(plan.layers.map(layer => layer.batches.flatMap(batch => batch.invocations.map(i => i.targetName)))).toEqual([
      ['A'],
      ['C'],
    ]);
    expect(plan.stats.upToDate).toBe(1);
    expect(workspace.graph.isTouched(`${labDir}#A`)).toBe(true);
  });

  it('schedules fresh targets with force', async () => {
    const workspace = createTestWorkspace(root, kinds);
    await workspace.engine.make(workspace.resolve(labDir).target('C'));

    const plan = workspace.scan(labDir, { force: true });

    expect(plan.force).toBe(true);
    expect(plan.layers[0].batches[0].invocations).toEqual([invocation(labDir, 'A', 'forced', true)]);
    expect(plan.stats.scheduled).toBe(3);
  });

  it('visits sub-modules only when recursive', () => {
    const subDir = writeDeclaration(path.join(labDir, 'Sub.x'));
    writeDeclaration(path.join(labDir, '_Sub.off'));
    const workspace = createTestWorkspace(root, kinds);

    expect(workspace.scan(labDir).stats.modules).toBe(1);

    const plan = workspace.scan(labDir, { recursive: true });
    expect(plan.stats.modules).toBe(2);
    expect(plan.layers[1]).toEqual({
      depth: 1,
      batches: [
        { parallelizable: '100%', invocations: [invocation(subDir, 'S')] },
        { parallelizable: 'cpu', invocations: [invocation(labDir, 'C')] },
      ],
    });
  });

  it('visits every module once when symlinks lead back into the tree', () => {
    const subDir = writeDeclaration(path.join(labDir, 'Sub.x'));
    fs.symlinkSync(labDir, path.join(labDir, 'Lab.loop'));
    fs.symlinkSync(subDir, path.join(labDir, 'Sub.again'));
    const workspace = createTestWorkspace(root, kinds);

    const plan = workspace.scan(labDir, { recursive: true });

    expect(plan.stats.modules).toBe(2);
    expect(plan.stats.scheduled).toBe(4);
    expect(workspace.modules(labDir, true).map(module => module.path)).toEqual([labDir, subDir]);
  });

  it('pulls in stale prerequisites from outside the scanned modules', () => {
    const subDir = writeDeclaration(path.join(labDir, 'Sub.x'));
    const workspace = createTestWorkspace(root, kinds);

    const plan = workspace.scan(subDir, { force: true });

    expect(plan.layers).toEqual([
      { depth: 0, batches: [{ parallelizable: 'cpu', invocations: [invocation(labDir, 'A', 'prerequisite')] }] },
      { depth: 1, batches: [{ parallelizable: '100%', invocations: [invocation(subDir, 'S', 'stale', true)] }] },
    ]);
    expect(plan.stats.targets).toBe(2);
  });

  it('blocks targets over stale outside prerequisites when told not to pull them in', () => {
    const subDir = writeDeclaration(path.join(labDir, 'Sub.x'));
    const workspace = createTestWorkspace(root, kinds);

    const plan = workspace.scan(subDir, { includePrerequisites: false });

    expect(plan.layers).toEqual([]);
    expect(plan.blocked).toEqual([
      {
        targetId: `${subDir}#S`,
        modulePath: subDir,
        targetName: 'S',
        reason: `prerequisite ${labDir}#A is stale and outside the scan`,
      },
    ]);
  });

  it('blocks missing direct targets and everything above them', () => {
    const dataDir = writeDeclaration(path.join(root, 'Data'));
    const workspace = createTestWorkspace(root, kinds);

    const plan = workspace.scan(dataDir);

    expect(plan.blocked.map(blocked => [blocked.targetName, blocked.reason])).toEqual([
      ['raw', `direct target ${path.join(dataDir, 'raw.csv')} is missing`],
      ['clean', `prerequisite ${dataDir}#raw is blocked`],
    ]);
    expect(plan.layers).toEqual([
      { depth: 0, batches: [{ parallelizable: '100%', invocations: [invocation(dataDir, 'other')] }] },
    ]);
  });

  it('counts existing direct targets as up to date', () => {
    const dataDir = writeDeclaration(path.join(root, 'Data'));
    fs.writeFileSync(path.join(dataDir, 'raw.csv'), 'x,y');
    const workspace = createTestWorkspace(root, kinds);

    const plan = workspace.scan(dataDir);

    expect(plan.blocked).toEqual([]);
    expect(plan.stats.upToDate).toBe(1);
    expect(plan.stats.scheduled).toBe(2);
  });

  it('records failing sub-modules and scans the rest', () => {
    const badDir = writeDeclaration(path.join(labDir, 'Bad.x'));
    writeDeclaration(path.join(labDir, 'Sub.x'));
    const workspace = createTestWorkspace(root, kinds);

    const plan = workspace.scan(labDir, { recursive: true });

    expect(plan.issues).toEqual([{ modulePath: badDir, message: `Loading module ${badDir} failed: bad settings` }]);
    expect(plan.stats.modules).toBe(2);
  });

  it('aborts on structural errors in sub-modules', () => {
    writeDeclaration(path.join(labDir, 'Unknown.x'));
    const workspace = createTestWorkspace(root, kinds);

    expect(() => workspace.scan(labDir, { recursive: true })).toThrow(UnknownModuleKindError);
  });

  it('never builds anything', () => {
    const workspace = createTestWorkspace(root, kinds);

    workspace.scan(labDir, { force: true });

    expect(fs.readdirSync(labDir)).toEqual(['stage.json']);
  });
});
