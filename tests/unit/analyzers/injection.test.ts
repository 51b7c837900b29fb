// Copyright (C) 2025 Keygraph, Inc.
//
// This program is free software: you can redistribute it and/or modify
// it under the terms of the GNU Affero General Public License version 3
// as published by the Free Software Foundation.


import { describe, it, expect } from '@jest/globals';
import { extractParameters, injectPayload, parseTargetUrl } from '../../../src/analyzers/injection.js';
import { ErrorCode } from '../../../src/types/errors.js';

const FALLBACK = [{ name: 'id', baseline: '1' }];

describe('extractParameters', () => {
  it('keeps the first value of each query parameter', () => {
    const url = new URL('https://app.test/?a=1&b=2&a=3');
    expect(extractParameters(url, FALLBACK)).toEqual([
      { name: 'a', baseline: '1' },
      { name: 'b', baseline: '2' },
    ]);
  });

  it('returns a copy of the fallback set when there is no query', () => {
    const params = extractParameters(new URL('https://app.test/'), FALLBACK);
    expect(params).toEqual(FALLBACK);
    expect(params[0]).not.toBe(FALLBACK[0]);
  });
});

describe('injectPayload', () => {
  it('replaces only the target parameter and drops the fragment', () => {
    const url = new URL('https://app.test/list?page=2&sort=asc#top');
    const params = extractParameters(url, FALLBACK);
    expect(injectPayload(url, params, 'sort', "' OR 1=1 --")).toBe(
      'https://app.test/list?page=2&sort=%27+OR+1%3D1+--'
    );
  });
});

describe('parseTargetUrl', () => {
  it('returns a parse error for malformed input', () => {
    const result = parseTargetUrl('::not-a-url', 'XSS');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe(ErrorCode.PARSE_ERROR);
      expect(result.error.context.analyzer).toBe('XSS');
    }
  });
});
