import { describe, it, expect, afterEach, vi } from 'vitest';
import {
  loadPresets,
  selectPreset,
  mergeRuleInput,
  mergeUnique,
  BUILTIN_PRESETS,
  PRESETS_TEMPLATE,
} from '../../../src/config/presets.js';
import { ConfigurationError } from '../../../src/context/errors.js';
import { writeFileSync, mkdirSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';

// ── Helpers ─────────────────────────────────────────────────────────────────

const TEST_DIR = join(tmpdir(), 'ctxpack-presets-test-' + Date.now());

function writePresets(filename: string, content: unknown): string {
  mkdirSync(TEST_DIR, { recursive: true });
  const filepath = join(TEST_DIR, filename);
  writeFileSync(filepath, typeof content === 'string' ? content : JSON.stringify(content), 'utf-8');
  return filepath;
}

// ── Tests ───────────────────────────────────────────────────────────────────

describe('loadPresets', () => {
  afterEach(() => {
    rmSync(TEST_DIR, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  // ── File loading ──────────────────────────────────────────────────────────

  it('throws if an explicit presets file does not exist', () => {
    expect(() => loadPresets('/nonexistent/path/presets.json')).toThrow('Presets file not found');
  });

  it('throws ConfigurationError on invalid JSON', () => {
    const path = writePresets('bad.json', '{ not valid json }');
    expect(() => loadPresets(path)).toThrow(ConfigurationError);
    expect(() => loadPresets(path)).toThrow('Invalid JSON');
  });

  it('throws if the file is an array', () => {
    const path = writePresets('array.json', [1, 2, 3]);
    expect(() => loadPresets(path)).toThrow('must contain a JSON object');
  });

  it('loads an empty object', () => {
    const path = writePresets('empty.json', {});
    expect(loadPresets(path)).toEqual({});
  });

  // ── Preset fields ─────────────────────────────────────────────────────────

  it('loads every preset field', () => {
    const path = writePresets('full.json', PRESETS_TEMPLATE);
    expect(loadPresets(path)).toEqual(PRESETS_TEMPLATE);
  });

  it('drops fields that are not set', () => {
    const path = writePresets('partial.json', { web: { includeExtensions: ['.ts'] } });
    expect(loadPresets(path)).toEqual({ web: { includeExtensions: ['.ts'] } });
  });

  it('throws if a preset is not an object', () => {
    const path = writePresets('scalar.json', { web: 'src' });
    expect(() => loadPresets(path)).toThrow('Preset "web" must be an object');
  });

  it('throws if a field is not an array of strings', () => {
    const path = writePresets('not-array.json', { web: { include: 'src/**' } });
    expect(() => loadPresets(path)).toThrow('Preset "web": "include" must be an array of strings');
  });

  it('throws if an array holds a non-string', () => {
    const path = writePresets('mixed.json', { web: { excludeFiles: ['a.ts', 3] } });
    expect(() => loadPresets(path)).toThrow('"excludeFiles" must be an array of strings');
  });

  // ── Unknown keys ──────────────────────────────────────────────────────────

  it('warns about unknown keys and ignores them', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const path = writePresets('unknown.json', { web: { include: ['src/**'], colour: 'red', depth: 2 } });

    expect(loadPresets(path)).toEqual({ web: { include: ['src/**'] } });
    expect(warn).toHaveBeenCalledWith('Warning: Unknown keys in preset "web" ignored: colour, depth');
  });
});

describe('selectPreset', () => {
  it('returns a built-in preset by name', () => {
    expect(selectPreset({}, 'python')).toEqual(BUILTIN_PRESETS.python);
  });

  it('lets a user preset replace a built-in one', () => {
    const user = { python: { includeExtensions: ['.pyi'] } };
    expect(selectPreset(user, 'python')).toEqual({ includeExtensions: ['.pyi'] });
  });

  it('throws on an unknown name, listing what exists', () => {
    expect(() => selectPreset({ web: {} }, 'go')).toThrow(
      'Unknown preset "go". Available presets: python, rust, typescript, web'
    );
  });

  it('does not treat inherited object keys as preset names', () => {
    expect(() => selectPreset({}, 'toString')).toThrow(
      'Unknown preset "toString". Available presets: python, rust, typescript'
    );
    expect(() => selectPreset({}, 'constructor')).toThrow(ConfigurationError);
  });

  it('falls back to a user preset named after the project', () => {
    const user = { myproj: { includeFiles: ['main.py'] } };
    expect(selectPreset(user, undefined, 'myproj')).toEqual({ includeFiles: ['main.py'] });
  });

  it('does not pick a built-in preset by project name', () => {
    expect(selectPreset({}, undefined, 'python')).toBeUndefined();
  });

  it('ignores inherited object keys as project names', () => {
    expect(selectPreset({}, undefined, 'constructor')).toBeUndefined();
  });

  it('prefers an explicit name over the project name', () => {
    const user = { myproj: { includeFiles: ['main.py'] } };
    expect(selectPreset(user, 'rust', 'myproj')).toEqual(BUILTIN_PRESETS.rust);
  });
});

describe('mergeUnique', () => {
  it('keeps the first occurrence of each value', () => {
    expect(mergeUnique(['.py', '.md'], ['.md', '.txt', '.py'])).toEqual(['.py', '.md', '.txt']);
  });

  it('handles missing lists', () => {
    expect(mergeUnique(undefined, ['a'])).toEqual(['a']);
    expect(mergeUnique()).toEqual([]);
  });
});

describe('mergeRuleInput', () => {
  it('puts preset values before command-line values', () => {
    const rules = mergeRuleInput(
      { includeExtensions: ['.py'], exclude: ['build/'] },
      { includeExtensions: ['.md', '.py'], exclude: ['dist/'] }
    );
    expect(rules.includeExtensions).toEqual(['.py', '.md']);
    expect(rules.excludePatterns).toEqual(['build/', 'dist/']);
  });

  it('maps preset fields onto rule input', () => {
    const rules = mergeRuleInput(PRESETS_TEMPLATE['my-project'], {});
    expect(rules).toEqual({
      includePatterns: ['src/**'],
      includeExtensions: ['.ts', '.md'],
      includeFiles: ['package.json'],
      excludePatterns: ['src/generated/', '*.snap'],
      excludeExtensions: ['.map'],
      excludeFiles: ['src/legacy.ts'],
      includeInTreeOnly: ['README.md', '.lock'],
    });
  });

  it('uses only command-line values without a preset', () => {
    const rules = mergeRuleInput(undefined, { includeInTree: ['README.md'] });
    expect(rules.includeInTreeOnly).toEqual(['README.md']);
    expect(rules.includePatterns).toEqual([]);
  });
});
