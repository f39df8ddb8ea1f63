import { describe, it, expect } from 'vitest';
import { matchingGlob, projectRelative, validatePath } from '../../src/security/pathGuard.js';
import type { PathRules } from '../../src/security/pathGuard.js';
import * as path from 'node:path';
import * as os from 'node:os';
import * as fs from 'node:fs';

describe('validatePath', () => {
  const tmpRoot = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), 'pathguard-')));
  const projectRoot = path.join(tmpRoot, 'project');
  const outsideDir = path.join(tmpRoot, 'outside');

  fs.mkdirSync(path.join(projectRoot, 'src'), { recursive: true });
  fs.mkdirSync(outsideDir, { recursive: true });
  fs.writeFileSync(path.join(projectRoot, 'src', 'index.ts'), 'content');
  fs.writeFileSync(path.join(projectRoot, '.env'), 'PLACEHOLDER=x');
  fs.writeFileSync(path.join(projectRoot, 'tasks.json'), '{}');
  fs.writeFileSync(path.join(outsideDir, 'file.ts'), 'content');
  fs.symlinkSync(outsideDir, path.join(projectRoot, 'escape'));

  const rules: PathRules = {
    denyGlobs: ['**/.env', '**/.ssh/**'],
    protectedGlobs: ['tasks.json', '.git/**'],
  };

  it('allows a relative path inside the project', () => {
    const result = validatePath('src/index.ts', projectRoot, rules, 'read');
    expect(result).toEqual({
      allowed: true,
      resolved: path.join(projectRoot, 'src', 'index.ts'),
      relative: 'src/index.ts',
    });
  });

  it('allows a file that does not exist yet', () => {
    const result = validatePath('src/new/module.ts', projectRoot, rules, 'write');
    expect(result.allowed).toBe(true);
    expect(result.relative).toBe('src/new/module.ts');
  });

  it('rejects ../ traversal out of the project', () => {
    const result = validatePath('../outside/file.ts', projectRoot, rules, 'read');
    expect(result.allowed).toBe(false);
    expect(result.reason).toBe('Path is outside the project root');
  });

  it('rejects a symlink that leads outside the project', () => {
    const result = validatePath('escape/file.ts', projectRoot, rules, 'read');
    expect(result.allowed).toBe(false);
    expect(result.reason).toBe('Path is outside the project root');
  });

  it('rejects deny-glob matches for reads and writes', () => {
    expect(validatePath('.env', projectRoot, rules, 'read').reason).toBe('Path matches deny glob: **/.env');
    expect(validatePath('.ssh/id_rsa', projectRoot, rules, 'write').allowed).toBe(false);
  });

  it('lets protected files be read but not written', () => {
    expect(validatePath('tasks.json', projectRoot, rules, 'read').allowed).toBe(true);
    const write = validatePath('tasks.json', projectRoot, rules, 'write');
    expect(write.allowed).toBe(false);
    expect(write.reason).toBe('Path is protected: tasks.json');
    expect(validatePath('.git/config', projectRoot, rules, 'write').reason).toBe('Path is protected: .git/**');
  });

  it('rejects empty and null-byte paths', () => {
    expect(validatePath('', projectRoot, rules, 'read').reason).toBe('Invalid path: empty or contains null byte');
    expect(validatePath('a\0b', projectRoot, rules, 'read').allowed).toBe(false);
  });
});

describe('projectRelative', () => {
  const root = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), 'relative-')));

  it('returns a forward-slash relative path or null', () => {
    expect(projectRelative('a/b.txt', root)).toBe('a/b.txt');
    expect(projectRelative(path.join(root, 'c.txt'), root)).toBe('c.txt');
    expect(projectRelative('/etc/passwd', root)).toBeNull();
  });
});

describe('matchingGlob', () => {
  it('returns the first matching glob, dotfiles included', () => {
    expect(matchingGlob('.git/HEAD', ['src/**', '.git/**'])).toBe('.git/**');
    expect(matchingGlob('src/a.ts', ['*.md'])).toBeNull();
  });
});
