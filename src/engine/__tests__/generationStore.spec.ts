import fs from 'fs';
import path from 'path';

import { artifactFingerprint, GenerationMarker } from '../generationStore';
import { TargetSpec } from '../types';
import { createTempDir, createTestWorkspace, defineKind, removeTempDir, writeAction, writeDeclaration } from './fixtures';

describe('GenerationStore', () => {
  let root: string;
  let labDir: string;

  beforeEach(() => {
    root = createTempDir();
    labDir = writeDeclaration(path.join(root, 'Lab'));
  });

  afterEach(() => {
    removeTempDir(root);
  });

  function setup() {
    const kind = defineKind(
      'Lab',
      (): TargetSpec[] => [
        { name: 'A', path: 'a.out', action: writeAction() },
        { name: 'A:plot', path: 'a.svg', action: writeAction(), depends: { a: 'A' } },
      ],
      true
    );
    const workspace = createTestWorkspace(root, [kind]);
    const module = workspace.resolve(labDir);
    return { store: workspace.store, module };
  }

  const marker = (target: string): GenerationMarker => ({
    version: 1,
    target,
    generation: 2,
    inputs: { a: 'g1' },
    builtAt: '2026-01-01T00:00:00.000Z',
  });

  it('keeps markers in the state directory of the module', () => {
    const { store, module } = setup();

    expect(store.markerPath(module.target('A'))).toBe(path.join(labDir, '.stagetree', 'A.json'));
    expect(store.markerPath(module.target('A:plot'))).toBe(path.join(labDir, '.stagetree', 'A%3Aplot.json'));
    expect(store.lockPath(module.target('A'))).toBe(path.join(labDir, '.stagetree', 'A.json.lock'));
  });

  it('reads back what it wrote', () => {
    const { store, module } = setup();
    const target = module.target('A');

    store.write(target, marker(target.id));

    expect(store.read(target)).toEqual(marker(target.id));
  });

  it('has no marker for never built targets', () => {
    const { store, module } = setup();

    expect(store.read(module.target('A'))).toBeUndefined();
  });

  it('ignores markers written for another target', () => {
    const { store, module } = setup();
    const target = module.target('A');

    store.write(target, marker(`${root}/Elsewhere#A`));

    expect(store.read(target)).toBeUndefined();
  });

  it('ignores unreadable markers', () => {
    const { store, module } = setup();
    const target = module.target('A');
    fs.mkdirSync(path.join(labDir, '.stagetree'), { recursive: true });

    fs.writeFileSync(store.markerPath(target), '{"version": 1,');
    expect(store.read(target)).toBeUndefined();

    fs.writeFileSync(store.markerPath(target), JSON.stringify({ ...marker(target.id), version: 2 }));
    expect(store.read(target)).toBeUndefined();
  });

  it('tells whether a removed marker existed', () => {
    const { store, module } = setup();
    const target = module.target('A');
    store.write(target, marker(target.id));

    expect(store.remove(target)).toBe(true);
    expect(store.remove(target)).toBe(false);
    expect(store.read(target)).toBeUndefined();
  });

  it('hands out increasing generations that survive marker removal', () => {
    const { store, module } = setup();
    const target = module.target('A');

    expect(store.reserveGeneration(target, 0)).toBe(1);
    expect(store.reserveGeneration(target, 4)).toBe(5);
    store.remove(target);

    expect(store.lastGeneration(target)).toBe(5);
    expect(store.reserveGeneration(target, 0)).toBe(6);
    expect(fs.readFileSync(store.counterPath(target), 'utf-8')).toBe('6\n');
  });

  it('never counts below the stored marker', () => {
    const { store, module } = setup();
    const target = module.target('A');
    store.write(target, marker(target.id));
    fs.writeFileSync(store.counterPath(target), 'garbage');

    expect(store.lastGeneration(target)).toBe(2);
    expect(store.reserveGeneration(target, 1)).toBe(3);
  });
});

describe('artifactFingerprint', () => {
  let root: string;

  beforeEach(() => {
    root = createTempDir();
  });

  afterEach(() => {
    removeTempDir(root);
  });

  it('uses modification time and size of files', () => {
    const fileName = path.join(root, 'points.csv');
    fs.writeFileSync(fileName, 'x,y\n');
    fs.utimesSync(fileName, 1000, 1000);

    expect(artifactFingerprint(fileName)).toBe('f1000000:4');
  });

  it('uses the newest entry and the entry count of directories', () => {
    const dir = path.join(root, 'images');
    fs.mkdirSync(path.join(dir, 'sub'), { recursive: true });
    fs.writeFileSync(path.join(dir, 'a.png'), 'a');
    fs.writeFileSync(path.join(dir, 'sub', 'b.png'), 'b');
    for (const entry of [dir, path.join(dir, 'a.png'), path.join(dir, 'sub')]) {
      fs.utimesSync(entry, 1000, 1000);
    }
    fs.utimesSync(path.join(dir, 'sub', 'b.png'), 2000, 2000);

    expect(artifactFingerprint(dir)).toBe('d2000000:3');
  });

  it('counts dangling symlinks inside directories as entries', () => {
    const dir = path.join(root, 'images');
    fs.mkdirSync(dir);
    fs.symlinkSync(path.join(dir, 'gone.png'), path.join(dir, 'link.png'));
    fs.lutimesSync(path.join(dir, 'link.png'), 500, 500);
    fs.utimesSync(dir, 1000, 1000);

    expect(artifactFingerprint(dir)).toBe('d1000000:1');
  });

  it('is undefined for missing artifacts', () => {
    expect(artifactFingerprint(path.join(root, 'missing'))).toBeUndefined();
  });
});
