import { describe, it, expect } from 'vitest';

import {
  checkFetchableUrl,
  checkImageUrl,
  checkVideoUrl,
  toMediaAsset,
} from '../../../src/media/media-validator';

const OPTIONS = { trustedDomains: ['cdn.example.com'] };

describe('checkFetchableUrl', () => {
  it.each([
    ['http://images.example.net/a.jpg', 'Protocol not allowed: http:'],
    ['https://localhost/a.jpg', 'Localhost URLs are not allowed'],
    ['https://10.0.0.8/a.jpg', 'Private IP range (10.x.x.x)'],
    ['https://172.20.1.1/a.jpg', 'Private IP range (172.16-31.x.x)'],
    ['https://169.254.169.254/latest', 'Link-local IP range (169.254.x.x)'],
    ['https://metadata.google.internal/', 'Cloud metadata service access blocked'],
    ['not a url', 'Invalid URL format'],
  ])('rejects %s', (url, reason) => {
    expect(checkFetchableUrl(url)).toEqual({ ok: false, reason });
  });

  it('accepts public https urls', () => {
    expect(checkFetchableUrl('https://172.32.0.1/a.jpg')).toEqual({ ok: true });
  });
});

describe('checkImageUrl', () => {
  it('requires a trusted domain and an image extension', () => {
    expect(checkImageUrl('https://img.cdn.example.com/a.webp', OPTIONS)).toEqual({ ok: true });
    expect(checkImageUrl('https://evil.example.org/a.jpg', OPTIONS)).toEqual({
      ok: false,
      reason: 'Untrusted domain: evil.example.org',
    });
    expect(checkImageUrl('https://cdn.example.com/a.svg', OPTIONS)).toEqual({
      ok: false,
      reason: 'Unsupported image format: /a.svg',
    });
  });
});

describe('checkVideoUrl', () => {
  it('accepts trusted video hosts only', () => {
    expect(checkVideoUrl('https://vimeo.com/12345')).toEqual({ ok: true });
    expect(checkVideoUrl('https://videos.example.com/watch/1')).toEqual({
      ok: false,
      reason: 'Untrusted video host: videos.example.com',
    });
  });
});

describe('toMediaAsset', () => {
  it('records the validation result without dropping the asset', () => {
    expect(toMediaAsset('https://evil.example.org/a.jpg', 'image', OPTIONS, { alt: 'kettle' })).toEqual({
      url: 'https://evil.example.org/a.jpg',
      kind: 'image',
      validated: false,
      alt: 'kettle',
    });
  });
});
