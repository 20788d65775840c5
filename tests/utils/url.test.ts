import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { charLength, endsWithChars, isLocalRelativePath, isRelativeUrl, joinUrl } from '../../src/utils/url.js';

describe('url utilities', () => {
  it('detects relative URLs', () => {
    assert.equal(isRelativeUrl('js/app.js'), true);
    assert.equal(isRelativeUrl('/js/app.js'), true);
    assert.equal(isRelativeUrl('//cdn.example.com/app.js'), false);
    assert.equal(isRelativeUrl('https://cdn.example.com/app.js'), false);
  });

  it('treats root-relative paths as non-local', () => {
    assert.equal(isLocalRelativePath('js/app.js'), true);
    assert.equal(isLocalRelativePath('/js/app.js'), false);
  });

  it('joins with exactly one slash', () => {
    assert.equal(joinUrl('/assets/', '/js/app.js'), '/assets/js/app.js');
    assert.equal(joinUrl('https://cdn.example.com', 'a.js'), 'https://cdn.example.com/a.js');
    assert.equal(joinUrl('/', 'a.js'), '/a.js');
    assert.equal(joinUrl('', 'a.js'), 'a.js');
  });

  it('compares suffixes by code points', () => {
    assert.equal(endsWithChars('lang/日本語.js', '本語.js'), true);
    assert.equal(endsWithChars('a.js', 'long/a.js'), false);
    assert.equal(charLength('日本語'), 3);
    assert.equal(charLength('😀.js'), 4);
  });
});
