import { describe, it, expect } from 'vitest';
import { parseRequirement } from '@core/requirement';

describe('parseRequirement', () => {
  it('reads the quota from a caseworker sentence', () => {
    expect(parseRequirement('Skal søge 5 jobs om måneden')).toEqual({ kind: 'quota', quota: 5 });
    expect(parseRequirement('4 job pr måned')).toEqual({ kind: 'quota', quota: 4 });
  });

  it('matches the unit case-insensitively', () => {
    expect(parseRequirement('Mindst 10 JOB hver måned')).toEqual({ kind: 'quota', quota: 10 });
    expect(parseRequirement('3 Jobansøgninger')).toEqual({ kind: 'quota', quota: 3 });
  });

  it('takes the first number that is followed by "job"', () => {
    expect(parseRequirement('2 samtaler og 6 jobs om måneden, evt. 8 jobs')).toEqual({
      kind: 'quota',
      quota: 6,
    });
  });

  it('accepts any whitespace run between number and unit', () => {
    expect(parseRequirement('12\tjob')).toEqual({ kind: 'quota', quota: 12 });
    expect(parseRequirement('Søg 7   jobs')).toEqual({ kind: 'quota', quota: 7 });
  });

  it('requires whitespace between number and unit', () => {
    expect(parseRequirement('Søg 3job')).toEqual({ kind: 'indeterminate' });
  });

  it('uses the digit run directly before the unit', () => {
    expect(parseRequirement('uge42 job')).toEqual({ kind: 'quota', quota: 42 });
  });

  it('is indeterminate when no number precedes "job"', () => {
    expect(parseRequirement('Ingen krav')).toEqual({ kind: 'indeterminate' });
    expect(parseRequirement('Fem jobs om måneden')).toEqual({ kind: 'indeterminate' });
    expect(parseRequirement('   ')).toEqual({ kind: 'indeterminate' });
  });

  it('is not_found when the text is missing or empty', () => {
    expect(parseRequirement(null)).toEqual({ kind: 'not_found' });
    expect(parseRequirement(undefined)).toEqual({ kind: 'not_found' });
    expect(parseRequirement('')).toEqual({ kind: 'not_found' });
  });

  it('reports a zero quota separately', () => {
    expect(parseRequirement('0 job')).toEqual({ kind: 'zero' });
    expect(parseRequirement('Skal søge 00 jobs')).toEqual({ kind: 'zero' });
  });
});
