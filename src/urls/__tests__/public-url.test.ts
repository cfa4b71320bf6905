/**
 * Tests for public URLs and transformation parameters
 */

import { describe, it, expect } from 'vitest';
import { buildPublicUrl } from '../public-url.js';
import { buildDownloadParams, buildTransformParams, sanitizeTransform } from '../transform.js';
import { encodeKey, normalizePath, objectPath } from '../paths.js';

const ENDPOINT = 'https://test-project.supabase.co/storage/v1';

describe('buildTransformParams', () => {
  it('should emit parameters in width, height, resize, format, quality order', () => {
    const params = buildTransformParams({
      quality: 80,
      format: 'webp',
      resize: 'contain',
      height: 200,
      width: 300,
    });

    expect(params.toString()).toBe('width=300&height=200&resize=contain&format=webp&quality=80');
  });

  it('should drop an unknown resize value', () => {
    expect(buildTransformParams({ width: 100, resize: 'stretch' }).toString()).toBe('width=100');
  });
});

describe('sanitizeTransform', () => {
  it('should keep a valid resize value', () => {
    expect(sanitizeTransform({ resize: 'fill', width: 10 })).toEqual({ resize: 'fill', width: 10 });
  });

  it('should remove an invalid resize value', () => {
    expect(sanitizeTransform({ resize: 'zoom', height: 5 })).toEqual({ height: 5 });
  });
});

describe('buildDownloadParams', () => {
  it('should append download after transform parameters', () => {
    expect(buildDownloadParams({ transform: { width: 50 }, download: true }).toString()).toBe(
      'width=50&download=true'
    );
  });

  it('should be empty without options', () => {
    expect(buildDownloadParams().toString()).toBe('');
  });
});

describe('paths', () => {
  it('should strip and collapse slashes', () => {
    expect(normalizePath('/a//b/c.png/')).toBe('a/b/c.png');
  });

  it('should encode each segment and keep separators', () => {
    expect(encodeKey('my folder/file #1.txt')).toBe('my%20folder/file%20%231.txt');
    expect(objectPath('my bucket', 'a/b.txt')).toBe('my%20bucket/a/b.txt');
  });
});

describe('buildPublicUrl', () => {
  it('should use the object route without a transform', () => {
    expect(buildPublicUrl(ENDPOINT, 'public-bucket', 'folder/file.txt')).toBe(
      `${ENDPOINT}/object/public/public-bucket/folder/file.txt`
    );
  });

  it('should use the render route with a transform', () => {
    expect(
      buildPublicUrl(ENDPOINT, 'images', 'cat.png', {
        transform: { width: 300, height: 200, resize: 'cover' },
      })
    ).toBe(`${ENDPOINT}/render/image/public/images/cat.png?width=300&height=200&resize=cover`);
  });

  it('should omit an invalid resize value from the query', () => {
    expect(
      buildPublicUrl(ENDPOINT, 'images', 'cat.png', { transform: { width: 300, resize: 'bogus' } })
    ).toBe(`${ENDPOINT}/render/image/public/images/cat.png?width=300`);
  });

  it('should add download=true on the object route', () => {
    expect(buildPublicUrl(ENDPOINT, 'docs', 'report.pdf', { download: true })).toBe(
      `${ENDPOINT}/object/public/docs/report.pdf?download=true`
    );
  });
});
