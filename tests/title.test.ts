import { describe, expect, it } from 'vitest';
import { disambiguateTitle, stripLabels } from '../src/scrapers/forum/title.js';

describe('disambiguateTitle', () => {
  it('splits version and developer brackets', () => {
    expect(disambiguateTitle('Game Name [v1.2.3] [DevCo]')).toEqual({
      title: 'Game Name',
      version: '1.2.3',
      developer: 'DevCo'
    });
  });

  it('does not take a lone version bracket for the developer', () => {
    expect(disambiguateTitle('Game Name [1.2.3]')).toEqual({ title: 'Game Name', version: '1.2.3', developer: '' });
  });

  it('compares the last bracket with the version text exactly', () => {
    expect(disambiguateTitle('Game Name [v0.9]')).toEqual({ title: 'Game Name', version: '0.9', developer: 'v0.9' });
  });

  it('keeps version suffixes inside the bracket', () => {
    expect(disambiguateTitle('Starfall [v0.5 Beta] [Night Owl]')).toEqual({
      title: 'Starfall',
      version: '0.5 Beta',
      developer: 'Night Owl'
    });
  });

  it('reads a developer when there is no version', () => {
    expect(disambiguateTitle('Untitled Project [Final] [Somebody]')).toEqual({
      title: 'Untitled Project [Final]',
      version: '',
      developer: 'Somebody'
    });
  });

  it('leaves titles without brackets alone', () => {
    expect(disambiguateTitle('  Plain Title  ')).toEqual({ title: 'Plain Title', version: '', developer: '' });
  });

  it('closes the gap left by a bracket in the middle', () => {
    expect(disambiguateTitle('Harbor [v2.0] Remastered [Tide Games]').title).toBe('Harbor Remastered');
  });
});

describe('stripLabels', () => {
  it('removes each label and the separators around it', () => {
    expect(stripLabels("Ren'Py Completed Game [v1] [Dev]", ["Ren'Py", 'Completed'])).toBe('Game [v1] [Dev]');
  });

  it('removes every occurrence of a label', () => {
    expect(stripLabels('VN Echo VN [1.0]', ['VN'])).toBe('Echo  [1.0]');
  });
});
