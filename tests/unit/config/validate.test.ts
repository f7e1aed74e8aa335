import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, mkdirSync, writeFileSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { classifyInclude, parseConfig, validateConfig } from '../../../src/config/index.js';
import { ConfigError, type ConfigErrorKind } from '../../../src/errors.js';

function errorKind(fn: () => unknown): ConfigErrorKind | undefined {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigError) return error.kind;
    throw error;
  }
  return undefined;
}

describe('validateConfig', () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'ctxcat-validate-'));
    mkdirSync(join(root, 'project', 'src'), { recursive: true });
    writeFileSync(join(root, 'notes.txt'), 'not a directory');
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  // ── Failures ──────────────────────────────────────────────────────────────

  it('fails with MissingBaseDir when basedir is empty', () => {
    const config = parseConfig('---\ninclude=src');
    expect(errorKind(() => validateConfig(config, { cwd: root }))).toBe('MissingBaseDir');
  });

  it('fails with BaseDirNotFound when the directory does not exist', () => {
    const config = parseConfig(`---\nbasedir=${join(root, 'missing')}\ninclude=src`);
    expect(errorKind(() => validateConfig(config, { cwd: root }))).toBe('BaseDirNotFound');
  });

  it('fails with BaseDirNotDirectory when basedir is a file', () => {
    const config = parseConfig(`---\nbasedir=${join(root, 'notes.txt')}\ninclude=src`);
    expect(errorKind(() => validateConfig(config, { cwd: root }))).toBe('BaseDirNotDirectory');
  });

  it('fails with NoIncludesSpecified when there are no includes', () => {
    const config = parseConfig(`---\nbasedir=${join(root, 'project')}`);
    expect(errorKind(() => validateConfig(config, { cwd: root }))).toBe('NoIncludesSpecified');
  });

  it('rejects a relative basedir for glob includes', () => {
    const config = parseConfig('---\nbasedir=project\ninclude=*.ts');
    expect(errorKind(() => validateConfig(config, { cwd: root }))).toBe('RelativeBaseDirNotAllowed');
  });

  it('rejects an unknown heading style from the file', () => {
    const config = parseConfig(`---\nbasedir=${join(root, 'project')}\ninclude=src\nheading=sideways`);
    expect(errorKind(() => validateConfig(config, { cwd: root }))).toBe('InvalidHeadingStyle');
  });

  it('rejects an unknown heading style from the command line', () => {
    const config = parseConfig(`---\nbasedir=${join(root, 'project')}\ninclude=src`);
    expect(errorKind(() => validateConfig(config, { cwd: root, heading: 'full' }))).toBe('InvalidHeadingStyle');
  });

  it('includes the offending path in the message', () => {
    const missing = join(root, 'missing');
    const config = parseConfig(`---\nbasedir=${missing}\ninclude=src`);
    expect(() => validateConfig(config, { cwd: root })).toThrow(`basedir does not exist: ${missing}`);
  });

  // ── Resolution ────────────────────────────────────────────────────────────

  it('resolves a relative basedir against cwd for path includes', () => {
    const config = parseConfig('---\nbasedir=project\ninclude=src');
    const validated = validateConfig(config, { cwd: root });
    expect(validated.baseDir).toBe(join(root, 'project'));
  });

  it('keeps an absolute basedir for glob includes', () => {
    const config = parseConfig(`---\nbasedir=${join(root, 'project')}\ninclude=*.ts`);
    expect(validateConfig(config, { cwd: '/' }).baseDir).toBe(join(root, 'project'));
  });

  // ── Include classification ────────────────────────────────────────────────

  it('treats an include with a directory separator as a path despite brackets', () => {
    mkdirSync(join(root, 'project', 'app', '[id]'), { recursive: true });
    writeFileSync(join(root, 'project', 'app', '[id]', 'page.tsx'), 'export default function Page() {}');
    const config = parseConfig('---\nbasedir=project\ninclude=app/[id]/page.tsx');

    const validated = validateConfig(config, { cwd: root });

    expect(validated.includes).toEqual([{ kind: 'path', path: 'app/[id]/page.tsx' }]);
    expect(validated.scheme).toBe('structured');
  });

  it('keeps path includes as paths when an exclude glob is present', () => {
    const config = parseConfig('---\nbasedir=project\ninclude=src\nexclude=*.log');

    const validated = validateConfig(config, { cwd: root });

    expect(validated.includes).toEqual([{ kind: 'path', path: 'src' }]);
    expect(validated.scheme).toBe('structured');
    expect(validated.heading).toBe('absolute');
  });

  it('classifies each include on its own', () => {
    const config = parseConfig(`---\nbasedir=${join(root, 'project')}\ninclude=src\ninclude=*.ts`);

    const validated = validateConfig(config, { cwd: root });

    expect(validated.includes).toEqual([
      { kind: 'path', path: 'src' },
      { kind: 'glob', pattern: '*.ts' },
    ]);
    expect(validated.scheme).toBe('glob');
  });

  it('treats an existing name with glob characters as a path', () => {
    const base = join(root, 'project');
    writeFileSync(join(base, '[slug].ts'), 'export {};');

    expect(classifyInclude('[slug].ts', base)).toEqual({ kind: 'path', path: '[slug].ts' });
    expect(classifyInclude('[other].ts', base)).toEqual({ kind: 'glob', pattern: '[other].ts' });
    expect(classifyInclude('file?.txt', base)).toEqual({ kind: 'glob', pattern: 'file?.txt' });
    expect(classifyInclude('main.go', base)).toEqual({ kind: 'path', path: 'main.go' });
  });

  // ── Heading style ─────────────────────────────────────────────────────────

  it('defaults to absolute headings for path includes', () => {
    const config = parseConfig(`---\nbasedir=${join(root, 'project')}\ninclude=src`);
    expect(validateConfig(config, { cwd: root }).heading).toBe('absolute');
  });

  it('defaults to relative headings for glob includes', () => {
    const config = parseConfig(`---\nbasedir=${join(root, 'project')}\ninclude=*.ts`);
    expect(validateConfig(config, { cwd: root }).heading).toBe('relative');
  });

  it('uses the heading directive over the default', () => {
    const config = parseConfig(`---\nbasedir=${join(root, 'project')}\ninclude=src\nheading=relative`);
    expect(validateConfig(config, { cwd: root }).heading).toBe('relative');
  });

  it('lets the command line override the heading directive', () => {
    const config = parseConfig(`---\nbasedir=${join(root, 'project')}\ninclude=*.ts\nheading=relative`);
    expect(validateConfig(config, { cwd: root, heading: 'absolute' }).heading).toBe('absolute');
  });
});
