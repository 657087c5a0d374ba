import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { ExifTool, buildEmbedArgs } from '../../src/capabilities/exiftool.js';
import { FakeProcessRunner } from '../fixtures/fakeCapabilities.js';
import { silenceConsole } from '../fixtures/exportTree.js';

describe('Unit: exiftool capability', () => {
  beforeEach(() => {
    silenceConsole();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('availability', () => {
    it('reports the version when exiftool runs', () => {
      const runner = new FakeProcessRunner([{ status: 0, stdout: '12.76\n', stderr: '' }]);
      const exiftool = new ExifTool('/opt/bin/exiftool', runner);

      expect(exiftool.version()).toBe('12.76');
      expect(runner.calls).toEqual([{ command: '/opt/bin/exiftool', args: ['-ver'] }]);
    });

    it('is unavailable when the executable cannot be spawned', () => {
      const runner = new FakeProcessRunner([
        { status: null, stdout: '', stderr: '', error: new Error('spawn exiftool ENOENT') }
      ]);
      expect(new ExifTool('exiftool', runner).isAvailable()).toBe(false);
    });
  });

  describe('detect', () => {
    it('asks for the MIME type only', () => {
      const runner = new FakeProcessRunner([{ status: 0, stdout: 'video/quicktime\n', stderr: '' }]);
      const exiftool = new ExifTool('exiftool', runner);

      expect(exiftool.detect('/export/clip.mp4')).toBe('video/quicktime');
      expect(runner.calls[0].args).toEqual(['-s3', '-MIMEType', '/export/clip.mp4']);
    });

    it('returns undefined for files exiftool cannot identify', () => {
      const runner = new FakeProcessRunner([{ status: 1, stdout: '', stderr: 'Error: Unknown file type' }]);
      expect(new ExifTool('exiftool', runner).detect('/export/notes.xyz')).toBeUndefined();
    });

    it('throws when exiftool cannot be started', () => {
      const runner = new FakeProcessRunner([
        { status: null, stdout: '', stderr: '', error: new Error('spawn exiftool ENOENT') }
      ]);
      expect(() => new ExifTool('exiftool', runner).detect('/export/a.png'))
        .toThrow('exiftool could not run on /export/a.png: spawn exiftool ENOENT');
    });
  });

  describe('embed', () => {
    it('builds a recursive tags-from-sidecar invocation', () => {
      const args = buildEmbedArgs({ rootDir: '/export', excludeSubstring: 'edited' });

      expect(args.slice(0, 5)).toEqual(['-r', '-d', '%s', '-tagsfromfile', '%d/%F.supplemental-metadata.json']);
      expect(args).toContain('-DateTimeOriginal<PhotoTakenTimeTimestamp');
      expect(args).toContain('-GPSLatitude<GeoDataLatitude');
      expect(args).toContain('-overwrite_original');
      expect(args.slice(-5)).toEqual(['--ext', 'json', '-if', '$filename !~ /edited/', '/export']);
    });

    it('escapes the exclude substring for the condition', () => {
      const args = buildEmbedArgs({ rootDir: '/export', excludeSubstring: 'a.b/c' });
      expect(args[args.length - 2]).toBe('$filename !~ /a\\.b\\/c/');
    });

    it('drops the condition when nothing is excluded', () => {
      const args = buildEmbedArgs({ rootDir: '/export', excludeSubstring: '' });
      expect(args).not.toContain('-if');
      expect(args[args.length - 1]).toBe('/export');
    });

    it('reports failure from the exit status', () => {
      const runner = new FakeProcessRunner([
        { status: 1, stdout: '', stderr: 'Warning: Error opening file - a.jpg.supplemental-metadata.json' }
      ]);
      const result = new ExifTool('exiftool', runner).embed({ rootDir: '/export', excludeSubstring: 'edited' });

      expect(result).toEqual({
        ok: false,
        output: 'Warning: Error opening file - a.jpg.supplemental-metadata.json'
      });
    });
  });
});
