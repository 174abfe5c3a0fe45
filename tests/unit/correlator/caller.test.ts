import { describe, it, expect } from 'vitest';
import {
  DEFAULT_CALLER_OPTIONS,
  UNKNOWN_CALLER,
  extractCallerName,
  resolveCaller,
} from '../../../src/correlator/caller.js';

const MARKER_LINE = '2024/01/15 09:00:02,INFO,jp.co.example.dao.BaseDao,Daoの終了jp.co.example.dao.UserDao.findById';

describe('extractCallerName', () => {
  it('extracts the DAO class from the marker path', () => {
    expect(extractCallerName(MARKER_LINE)).toBe('UserDao');
  });

  it('accepts a class directly under the package prefix', () => {
    expect(extractCallerName('Daoの終了jp.co.UserDao')).toBe('UserDao');
  });

  it('stops the class name at a non-word character', () => {
    expect(extractCallerName('Daoの終了jp.co.example.dao.UserDao$1.run')).toBe('UserDao');
  });

  it('rejects names that only contain the suffix in the middle', () => {
    expect(extractCallerName('Daoの終了jp.co.example.UserDaoImpl.find')).toBeNull();
  });

  it('requires the package prefix right after the marker', () => {
    expect(extractCallerName('Daoの終了com.example.UserDao')).toBeNull();
  });

  it('ends the path at a comma', () => {
    expect(extractCallerName('Daoの終了jp.co.example.Foo,UserDao')).toBeNull();
  });

  it('supports custom markers and suffixes', () => {
    const options = { marker: 'END ', packagePrefix: 'com.acme.', classSuffix: 'Repository', window: 5 };

    expect(extractCallerName('END com.acme.repo.UserRepository', options)).toBe('UserRepository');
  });
});

describe('resolveCaller', () => {
  function linesWithMarkerAt(index: number): string[] {
    const lines = Array.from({ length: 60 }, () => 'noise');
    lines[0] = 'id=a sql=SELECT 1';
    lines[index] = MARKER_LINE;
    return lines;
  }

  it('finds a marker on the last line of the window', () => {
    expect(resolveCaller(linesWithMarkerAt(50), 0)).toBe('UserDao');
  });

  it('ignores markers past the window', () => {
    expect(resolveCaller(linesWithMarkerAt(51), 0)).toBe(UNKNOWN_CALLER);
  });

  it('takes the nearest marker', () => {
    const lines = ['id=a sql=SELECT 1', 'Daoの終了jp.co.x.FirstDao', 'Daoの終了jp.co.x.SecondDao'];

    expect(resolveCaller(lines, 0, DEFAULT_CALLER_OPTIONS)).toBe('FirstDao');
  });

  it('does not look at the statement line or earlier lines', () => {
    const lines = ['Daoの終了jp.co.x.EarlierDao', 'id=a sql=SELECT 1 Daoの終了jp.co.x.SameLineDao'];

    expect(resolveCaller(lines, 1)).toBe('Unknown');
  });
});
