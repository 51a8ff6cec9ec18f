import { EventEmitter } from 'events';
import fs from 'fs';
import path from 'path';
import { PassThrough } from 'stream';

import { spawn } from 'child_process';

import { BuildActionFailedError, UnknownTargetError } from '../../engine';
import {
  createTempDir,
  createTestWorkspace,
  removeTempDir,
  writeDeclaration,
  writeFile,
} from '../../engine/__tests__/fixtures';
import { commandModule, dependencyEnvName } from '../commandModule';
import { localDataModule } from '../localData';

jest.mock('child_process', () => ({ spawn: jest.fn() }));

const spawnMock = jest.mocked(spawn);

interface FakeRun {
  command: string;
  cwd?: string;
  env: NodeJS.ProcessEnv;
}

/**
 * Stands in for the shell: records the call, writes the artifact unless told to fail, then closes.
 */
function fakeShell(runs: FakeRun[], exitCode = 0, stderr = '') {
  spawnMock.mockImplementation(((command: string, options: { cwd?: string; env?: NodeJS.ProcessEnv }) => {
    const env = options.env || {};
    runs.push({ command, cwd: options.cwd, env });
    const child = Object.assign(new EventEmitter(), { stdout: new PassThrough(), stderr: new PassThrough() });
    setImmediate(() => {
      if (exitCode === 0 && env.STAGETREE_TARGET) {
        fs.writeFileSync(env.STAGETREE_TARGET, command);
      }
      child.stdout.end('done\n');
      child.stderr.end(stderr);
      setTimeout(() => child.emit('close', exitCode), 5);
    });
    return child;
  }) as unknown as typeof spawn);
}

describe('commands modules', () => {
  let root: string;
  let runs: FakeRun[];

  beforeEach(() => {
    root = createTempDir();
    runs = [];
    spawnMock.mockReset();
  });

  afterEach(() => {
    removeTempDir(root);
  });

  function writePipeline() {
    const dataDir = writeDeclaration(path.join(root, 'Data'), { kind: 'local-data', config: { pattern: '*.csv' } });
    writeFile(path.join(dataDir, 'points.csv'), 'x,y');
    const prepDir = writeDeclaration(path.join(dataDir, 'Prep'), {
      kind: 'commands',
      config: {
        env: { SEED: '7' },
        targets: {
          clean: { command: 'clean-points', path: 'clean.csv', depends: { src: '../points' }, parallelizable: 'io' },
          stats: { command: 'summarize', path: 'stats.json', depends: ['clean'] },
          'stats:plot': { command: 'plot', path: 'stats.svg', depends: { stats: 'stats' } },
          params: { path: 'params.yaml' },
        },
      },
    });
    const reportDir = writeDeclaration(path.join(root, 'Report'), {
      kind: 'commands',
      root: true,
      config: { targets: { summary: { command: 'report', path: 'summary.md', depends: ['../Data/Prep#stats'] } } },
    });
    return { dataDir, prepDir, reportDir };
  }

  it('declares targets from the declaration', () => {
    const { dataDir, prepDir } = writePipeline();
    const workspace = createTestWorkspace(root, [localDataModule, commandModule]);

    const module = workspace.resolve(prepDir);

    expect([...module.targets.keys()]).toEqual(['clean', 'stats', 'stats:plot', 'params']);
    expect(module.target('clean').dependencies).toEqual({ src: `${dataDir}#points` });
    expect(module.target('clean').parallelizable).toBe('io');
    expect(module.target('stats').dependencies).toEqual({ clean: `${prepDir}#clean` });
    expect(module.target('stats:plot').depth).toBe(3);
    expect(module.target('params').isDirect).toBe(true);
    expect(module.targetsPrimaryNames()).toEqual(['clean', 'stats', 'params']);
  });

  it('resolves references into other modules', () => {
    const { prepDir, reportDir } = writePipeline();
    const workspace = createTestWorkspace(root, [localDataModule, commandModule]);

    const summary = workspace.resolve(reportDir).target('summary');

    expect(summary.dependencies).toEqual({ stats: `${prepDir}#stats` });
  });

  it('fails on references to undeclared targets', () => {
    const dir = writeDeclaration(path.join(root, 'Broken'), {
      kind: 'commands',
      root: true,
      config: { targets: { out: { command: 'x', path: 'out', depends: ['missing'] } } },
    });
    const workspace = createTestWorkspace(root, [commandModule]);

    expect(() => workspace.resolve(dir)).toThrow(UnknownTargetError);
  });

  it('runs the command in the module directory with the artifact paths in the environment', async () => {
    fakeShell(runs);
    const { dataDir, prepDir } = writePipeline();
    const workspace = createTestWorkspace(root, [localDataModule, commandModule]);

    await workspace.engine.make(workspace.resolve(prepDir).target('stats'));

    expect(runs.map(run => run.command)).toEqual(['clean-points', 'summarize']);
    expect(runs[0].cwd).toBe(prepDir);
    expect(runs[0].env.STAGETREE_TARGET).toBe(path.join(prepDir, 'clean.csv'));
    expect(runs[0].env.STAGETREE_MODULE).toBe(prepDir);
    expect(runs[0].env.STAGETREE_DEP_SRC).toBe(path.join(dataDir, 'points.csv'));
    expect(runs[0].env.SEED).toBe('7');
    expect(runs[1].env.STAGETREE_DEP_CLEAN).toBe(path.join(prepDir, 'clean.csv'));
    expect(fs.readFileSync(path.join(prepDir, 'stats.json'), 'utf-8')).toBe('summarize');
  });

  it('fails the build when the command exits non-zero', async () => {
    fakeShell(runs, 2, 'no such column\n');
    const { prepDir } = writePipeline();
    const workspace = createTestWorkspace(root, [localDataModule, commandModule]);

    const make = workspace.engine.make(workspace.resolve(prepDir).target('clean'));

    await expect(make).rejects.toThrow(BuildActionFailedError);
    await expect(make).rejects.toThrow('command for clean exited with 2: clean-points\nno such column');
  });
});

describe('dependencyEnvName', () => {
  it('upper-cases the role and replaces other characters', () => {
    expect(dependencyEnvName('src')).toBe('STAGETREE_DEP_SRC');
    expect(dependencyEnvName('train-set:v2')).toBe('STAGETREE_DEP_TRAIN_SET_V2');
  });
});
