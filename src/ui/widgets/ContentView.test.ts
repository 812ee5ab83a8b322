import { describe, it, expect } from 'vitest';
import {
  classifyDiffLine,
  formatContentLine,
  formatContentTitle,
  formatContentView,
} from './ContentView.js';
import { makeStash } from '../../core/test-helpers.js';
import { getTheme } from '../../themes.js';

const theme = getTheme('dark');

describe('classifyDiffLine', () => {
  it('recognizes each kind of line', () => {
    expect(classifyDiffLine('diff --git a/x b/x')).toBe('fileHeader');
    expect(classifyDiffLine('index 1234..5678 100644')).toBe('fileHeader');
    expect(classifyDiffLine('--- a/x')).toBe('fileHeader');
    expect(classifyDiffLine('+++ b/x')).toBe('fileHeader');
    expect(classifyDiffLine('@@ -1,2 +1,2 @@')).toBe('hunk');
    expect(classifyDiffLine('+new')).toBe('added');
    expect(classifyDiffLine('-old')).toBe('removed');
    expect(classifyDiffLine(' same')).toBe('context');
    expect(classifyDiffLine(' a.ts | 2 +-')).toBe('context');
  });
});

describe('formatContentLine', () => {
  it('colors added and removed lines', () => {
    expect(formatContentLine('+a', theme, 80)).toBe('{green-fg}+a{/green-fg}');
    expect(formatContentLine('-a', theme, 80)).toBe('{red-fg}-a{/red-fg}');
  });

  it('bolds file headers', () => {
    expect(formatContentLine('+++ b/x', theme, 80)).toBe('{bold}{yellow-fg}+++ b/x{/yellow-fg}{/bold}');
  });

  it('expands tabs', () => {
    expect(formatContentLine(' \tx', theme, 80)).toBe('{gray-fg}     x{/gray-fg}');
  });

  it('truncates to the pane width', () => {
    expect(formatContentLine('-abcdef', theme, 4)).toBe('{red-fg}-ab…{/red-fg}');
  });

  it('escapes braces', () => {
    expect(formatContentLine('@@ -1 +1 @@ {', theme, 80)).toBe(
      '{cyan-fg}@@ -1 +1 @@ {open}{/cyan-fg}'
    );
  });
});

describe('formatContentTitle', () => {
  it('names the view and the stash', () => {
    const record = makeStash(0, 'On main: fix login');
    expect(formatContentTitle('diff', record)).toBe('Diff  stash@{0} - fix login');
    expect(formatContentTitle('files', record)).toBe('Files  stash@{0} - fix login');
  });

  it('falls back to the view name', () => {
    expect(formatContentTitle('files', null)).toBe('Files');
  });
});

describe('formatContentView', () => {
  it('shows a placeholder for empty content', () => {
    expect(formatContentView([], 0, 10, theme, 80)).toBe('{gray-fg}(no changes){/gray-fg}');
  });

  it('renders the window starting at the scroll offset', () => {
    expect(formatContentView(['a', 'b', 'c', 'd'], 1, 2, theme, 80)).toBe(
      '{gray-fg}b{/gray-fg}\n{gray-fg}c{/gray-fg}'
    );
  });
});
