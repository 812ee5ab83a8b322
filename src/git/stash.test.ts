import { describe, it, expect } from 'vitest';
import { extractBranch, extractShortMessage, parseStashList } from './stash.js';

describe('extractBranch', () => {
  it('reads the branch from a WIP subject', () => {
    expect(extractBranch('WIP on feature/x: abc123 msg')).toBe('feature/x');
  });

  it('reads the branch from a named stash', () => {
    expect(extractBranch('On main: cleanup')).toBe('main');
  });

  it('returns unknown without a known prefix', () => {
    expect(extractBranch('random text')).toBe('unknown');
  });

  it('returns the rest of the message when there is no colon', () => {
    expect(extractBranch('On main')).toBe('main');
  });
});

describe('extractShortMessage', () => {
  it('drops everything up to the first ": "', () => {
    expect(extractShortMessage('WIP on feature/x: abc123 msg')).toBe('abc123 msg');
    expect(extractShortMessage('On main: cleanup')).toBe('cleanup');
  });

  it('keeps later separators', () => {
    expect(extractShortMessage('On main: fix: login')).toBe('fix: login');
  });

  it('returns the full message without a separator', () => {
    expect(extractShortMessage('random text')).toBe('random text');
  });
});

describe('parseStashList', () => {
  it('returns an empty list for empty output', () => {
    expect(parseStashList('')).toEqual([]);
  });

  it('parses records in output order', () => {
    const output = [
      'stash@{0}|On main: cleanup|5 minutes ago',
      'stash@{1}|WIP on feature/x: abc123 msg|2 days ago',
      '',
    ].join('\n');

    expect(parseStashList(output)).toEqual([
      {
        index: 0,
        name: 'stash@{0}',
        message: 'On main: cleanup',
        branch: 'main',
        shortMessage: 'cleanup',
        date: '5 minutes ago',
      },
      {
        index: 1,
        name: 'stash@{1}',
        message: 'WIP on feature/x: abc123 msg',
        branch: 'feature/x',
        shortMessage: 'abc123 msg',
        date: '2 days ago',
      },
    ]);
  });

  it('keeps pipes inside the date field', () => {
    const [record] = parseStashList('stash@{0}|On main: a|b|c');
    expect(record.message).toBe('On main: a');
    expect(record.date).toBe('b|c');
  });

  it('skips lines with fewer than three fields and numbers records densely', () => {
    const output = 'garbage\nstash@{0}|only two\nstash@{1}|On dev: wip|1 hour ago';
    const records = parseStashList(output);
    expect(records).toHaveLength(1);
    expect(records[0].index).toBe(0);
    expect(records[0].name).toBe('stash@{1}');
  });

  it('strips carriage returns', () => {
    const [record] = parseStashList('stash@{0}|On main: x|3 weeks ago\r\n');
    expect(record.date).toBe('3 weeks ago');
  });
});
