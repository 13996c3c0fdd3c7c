import { promises as fs } from 'fs';
import moment from 'moment';
import os from 'os';
import path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { renderMetricsSection, replaceMetricsSection, updateReadme } from './readme';
import type { DailyStat } from './stats';

const now = moment.utc('2026-01-08T14:05:00Z');
const stats: DailyStat[] = [
  { day: '2026-01-08', prCount: 2, p50Hours: 3, p90Hours: 5.5, medianHours: 3, meanHours: 3.2 },
];
const section = [
  '| Day | PRs | P50 | P90 |',
  '|-----|-----|-----|-----|',
  '| 2026-01-08 | 2 | 3.0h | 5.5h |',
  '',
  '*Last updated: 2026-01-08 14:05 UTC*',
].join('\n');

describe('renderMetricsSection', () => {
  it('renders the table with the update time', () => {
    expect(renderMetricsSection(stats, now)).toBe(section);
  });

  it('renders the empty state note without data', () => {
    expect(renderMetricsSection([], now)).toBe(
      '| Day | PRs | P50 | P90 |\n|-----|-----|-----|-----|\n| No data | - | - | - |\n\n*Table will be populated when PRs are merged*',
    );
  });
});

describe('replaceMetricsSection', () => {
  it('replaces up to a horizontal rule', () => {
    const content = '# Project\n\n**Recent Metrics**\n\nold table\n\n---\n\nFooter\n';

    expect(replaceMetricsSection(content, 'NEW')).toBe('# Project\n\n**Recent Metrics**\n\nNEW\n\n---\n\nFooter\n');
  });

  it('replaces up to the next heading', () => {
    const content = '**Recent Metrics**\n\nold\n\n## Next\ntext';

    expect(replaceMetricsSection(content, 'NEW')).toBe('**Recent Metrics**\n\nNEW\n\n## Next\ntext');
  });

  it('stops at a top-level heading', () => {
    const content = '**Recent Metrics**\n\nold\n\n# Changelog\n\nkeep me\n';

    expect(replaceMetricsSection(content, 'NEW')).toBe('**Recent Metrics**\n\nNEW\n\n# Changelog\n\nkeep me\n');
  });

  it('replaces up to the end of the file', () => {
    expect(replaceMetricsSection('intro\n**Recent Metrics**\n\nold\nmore', 'NEW')).toBe('intro\n**Recent Metrics**\n\nNEW');
  });

  it('leaves content without the marker untouched', () => {
    const content = '# Project\n\nRecent Metrics\n\nold';

    expect(replaceMetricsSection(content, 'NEW')).toBe(content);
  });
});

describe('updateReadme', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'readme-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('rewrites the metrics section', async () => {
    const readme = path.join(dir, 'README.md');
    await fs.writeFile(readme, '# Project\n\n**Recent Metrics**\n\nold\n\n---\n');

    await expect(updateReadme(readme, stats, now)).resolves.toBe(true);
    await expect(fs.readFile(readme, 'utf-8')).resolves.toBe(`# Project\n\n**Recent Metrics**\n\n${section}\n\n---\n`);
  });

  it('does not write when nothing changed', async () => {
    const readme = path.join(dir, 'README.md');
    await fs.writeFile(readme, `**Recent Metrics**\n\n${section}\n\n---\n`);

    await expect(updateReadme(readme, stats, now)).resolves.toBe(false);
  });

  it('skips a missing README', async () => {
    await expect(updateReadme(path.join(dir, 'missing.md'), stats, now)).resolves.toBe(false);
  });
});
