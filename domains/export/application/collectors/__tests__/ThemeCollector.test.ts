import { describe, it, expect, vi } from 'vitest';

import { addLogHandler, type LogEntry } from '@kernel/logger';

import { THEME_UNAVAILABLE, ThemeCollector } from '../ThemeCollector';

describe('ThemeCollector', () => {
  it('should return the placeholder when no theme subsystem is installed', async () => {
    expect(await new ThemeCollector(null).collect()).toEqual({
      kind: 'unavailable',
      reason: THEME_UNAVAILABLE,
      placeholder: { active_theme_id: null, layouts: [], error: 'Theme manager not available.' },
    });
  });

  it('should return an empty document when no component offers a capability', async () => {
    expect(await new ThemeCollector([{}, { name: 'manager' }]).collect()).toEqual({
      kind: 'ok',
      document: { active_theme_id: null, layouts: [] },
    });
  });

  it('should take the first non-empty active id and the first list of layouts', async () => {
    const collector = new ThemeCollector([
      { getActiveThemeId: () => '' },
      { getActiveThemeId: () => 'tp-classic' },
      { getActiveThemeId: () => 'tp-other' },
      { listLayouts: () => 'default' },
      { listLayouts: async () => [{ key: 'default' }, { key: 'landing' }] },
    ]);

    expect(await collector.collect()).toEqual({
      kind: 'ok',
      document: {
        active_theme_id: 'tp-classic',
        layouts: [{ key: 'default' }, { key: 'landing' }],
      },
    });
  });

  it('should accept one component implementing both capabilities', async () => {
    const manager = {
      getActiveThemeId: vi.fn().mockReturnValue('tp-minimal'),
      listLayouts: vi.fn().mockResolvedValue([{ key: 'page' }]),
    };

    const result = await new ThemeCollector([manager]).collect();

    expect(result).toEqual({ kind: 'ok', document: { active_theme_id: 'tp-minimal', layouts: [{ key: 'page' }] } });
    expect(manager.getActiveThemeId).toHaveBeenCalledTimes(1);
  });

  it('should log and skip a capability that throws', async () => {
    const entries: LogEntry[] = [];
    addLogHandler(entry => entries.push(entry));

    const collector = new ThemeCollector([
      { getActiveThemeId: () => { throw new Error('theme cache corrupt'); } },
      { getActiveThemeId: () => 'tp-fallback' },
      { listLayouts: () => Promise.reject(new Error('layouts unreadable')) },
    ]);

    const result = await collector.collect();

    expect(result).toEqual({ kind: 'ok', document: { active_theme_id: 'tp-fallback', layouts: [] } });
    const warnings = entries.filter(entry => entry.level === 'warn');
    expect(warnings.map(entry => entry.metadata?.['error'])).toEqual(['theme cache corrupt', 'layouts unreadable']);
  });

  it('should carry the reason in the fallback placeholder', () => {
    expect(new ThemeCollector([]).fallback('boom')).toEqual({
      kind: 'unavailable',
      reason: 'boom',
      placeholder: { active_theme_id: null, layouts: [], error: 'boom' },
    });
  });
});
