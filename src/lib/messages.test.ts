import { describe, it, expect } from 'vitest';
import { fillTemplate, getMessages } from './messages';

describe('fillTemplate', () => {
  it('replaces every occurrence of a token', () => {
    expect(fillTemplate('DATE and DATE', { DATE: '2026-03-10' })).toBe('2026-03-10 and 2026-03-10');
  });

  it('drops lines whose tokens have no value', () => {
    const template = 'Name: NAME\nHumidity: HUMIDITY%\nEnd';
    expect(fillTemplate(template, { NAME: 'Nanjing', HUMIDITY: undefined })).toBe(
      'Name: Nanjing\nEnd',
    );
  });

  it('prefers the longest token when one name contains another', () => {
    expect(fillTemplate('WIND / WINDOW', { WIND: 'NE', WINDOW: '7' })).toBe('NE / 7');
  });

  it('does not expand tokens that appear inside inserted values', () => {
    expect(fillTemplate('SUMMARY', { SUMMARY: 'DATE is tomorrow', DATE: 'x' })).toBe(
      'DATE is tomorrow',
    );
  });

  it('collapses the blank lines left by dropped sections', () => {
    expect(fillTemplate('Top\n\nMIDDLE\n\nBottom', { MIDDLE: undefined })).toBe('Top\n\nBottom');
  });

  it('keeps Markdown hard line breaks', () => {
    expect(fillTemplate('**Date**: DATE  \nNext', { DATE: '2026-03-10' })).toBe(
      '**Date**: 2026-03-10  \nNext',
    );
  });
});

describe('getMessages', () => {
  it('selects the language from the locale prefix', () => {
    expect(getMessages('zh-CN').categories.Alert).toBe('气温剧变');
    expect(getMessages('en-GB').categories.Alert).toBe('Alert');
  });

  it('falls back to English for unknown languages', () => {
    expect(getMessages('fr-FR')).toBe(getMessages('en-US'));
  });
});
