import { describe, it, expect } from 'vitest';
import {
  fromAngleTemplate,
  fromBraceTemplate,
  fromColonTemplate,
  fromRegexTemplate,
  joinPaths,
  normalizePath,
} from '../../src/discovery/path.js';
import { fillTemplate } from '../../src/verifier/placeholder.js';

describe('normalizePath', () => {
  it('adds a leading slash and drops repeated and trailing slashes', () => {
    expect(normalizePath('users//42/')).toBe('/users/42');
    expect(normalizePath('/')).toBe('/');
    expect(normalizePath('')).toBe('/');
  });

  it('joins prefixes without doubling separators', () => {
    expect(joinPaths('/api/', '/items')).toBe('/api/items');
    expect(joinPaths(undefined, 'items')).toBe('/items');
  });
});

describe('path templates', () => {
  it('maps Flask and Django converters to parameter types', () => {
    expect(fromAngleTemplate('/files/<path:rest>')).toEqual({ path: '/files/{rest}', params: [{ name: 'rest', type: 'path' }] });
    expect(fromAngleTemplate('/u/<name>')).toEqual({ path: '/u/{name}', params: [{ name: 'name', type: 'string' }] });
    expect(fromAngleTemplate('/x/<color:c>')).toEqual({ path: '/x/{c}', params: [{ name: 'c', type: 'unknown' }] });
  });

  it('reads FastAPI converters and handler annotations', () => {
    expect(fromBraceTemplate('/items/{id}', { id: 'Optional[int]' })).toEqual({
      path: '/items/{id}',
      params: [{ name: 'id', type: 'int' }],
    });
    expect(fromBraceTemplate('/items/{id}')).toEqual({ path: '/items/{id}', params: [{ name: 'id', type: 'unknown' }] });
  });

  it('turns Express segments into named parameters', () => {
    expect(fromColonTemplate('/files/:name?')).toEqual({ path: '/files/{name}', params: [{ name: 'name', type: 'unknown' }] });
    expect(fromColonTemplate('/a/*/b/*')).toEqual({
      path: '/a/{wildcard}/b/{wildcard1}',
      params: [
        { name: 'wildcard', type: 'path' },
        { name: 'wildcard1', type: 'path' },
      ],
    });
  });

  it('turns named regex groups into parameters', () => {
    expect(fromRegexTemplate('^users/(?P<id>\\d+)/$')).toEqual({ path: '/users/{id}', params: [{ name: 'id', type: 'int' }] });
    expect(fromRegexTemplate('^tags/(?P<tag>[\\w-]+)$')).toEqual({ path: '/tags/{tag}', params: [{ name: 'tag', type: 'string' }] });
  });

  it('turns leftover regex syntax into positional parameters', () => {
    expect(fromRegexTemplate('^archive/[0-9]{4}/$')).toEqual({ path: '/archive/{arg1}', params: [{ name: 'arg1', type: 'int' }] });
    expect(fromRegexTemplate('^item/\\d+/$')).toEqual({ path: '/item/{arg1}', params: [{ name: 'arg1', type: 'int' }] });
    expect(fromRegexTemplate('^page/(\\d+)/comments/([\\w-]+)/?$')).toEqual({
      path: '/page/{arg1}/comments/{arg2}',
      params: [
        { name: 'arg1', type: 'int' },
        { name: 'arg2', type: 'string' },
      ],
    });
    expect(fromRegexTemplate('^files/[^/]+$')).toEqual({ path: '/files/{arg1}', params: [{ name: 'arg1', type: 'string' }] });
    expect(fromRegexTemplate('^robots\\.txt$')).toEqual({ path: '/robots.txt', params: [] });
  });

  it('yields templates the verifier can fill', () => {
    expect(fillTemplate(fromRegexTemplate('^archive/[0-9]{4}/$'))).toBe('/archive/0');
    expect(fillTemplate(fromRegexTemplate('^item/\\d+/$'))).toBe('/item/0');
  });
});
