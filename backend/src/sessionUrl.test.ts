import { describe, expect, it } from 'vitest';
import { buildSessionUrl } from './sessionUrl';

describe('buildSessionUrl', () => {
  it('points at the upload page when the catalog is empty', () => {
    expect(buildSessionUrl({ host: '192.168.1.20', port: 1082, catalogEmpty: true })).toEqual({
      url: 'http://192.168.1.20:1082/',
      page: 'upload',
    });
  });

  it('points at the download list when files are on offer', () => {
    expect(buildSessionUrl({ host: '192.168.1.20', port: 8080, catalogEmpty: false })).toEqual({
      url: 'http://192.168.1.20:8080/download-page',
      page: 'download',
    });
  });
});
