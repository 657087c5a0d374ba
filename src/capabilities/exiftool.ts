import { SIDECAR_SUFFIX } from '../core/sidecarNames.js';
import { logger } from '../logger.js';
import { spawnRunner } from './processRunner.js';
import type {
  EmbedRequest,
  EmbedResult,
  FormatDetector,
  MetadataEmbedder,
  ProcessResult,
  ProcessRunner
} from './types.js';

/**
 * Sidecar JSON field -> embedded tag assignments, in ExifTool `-DST<SRC` form.
 * Timestamps arrive as epoch seconds, hence `-d %s`.
 */
export const EMBED_TAG_MAPPINGS = [
  '-GPSAltitude<GeoDataAltitude',
  '-GPSLatitude<GeoDataLatitude',
  '-GPSLatitudeRef<GeoDataLatitude',
  '-GPSLongitude<GeoDataLongitude',
  '-GPSLongitudeRef<GeoDataLongitude',
  '-Keywords<PeopleName',
  '-Subject<PeopleName',
  '-Caption-Abstract<Description',
  '-ImageDescription<Description',
  '-DateTimeOriginal<PhotoTakenTimeTimestamp',
  '-FileCreateDate<PhotoTakenTimeTimestamp',
  '-FileModifyDate<PhotoTakenTimeTimestamp'
] as const;

function escapePerlPattern(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\/@]/g, '\\$&');
}

export function buildEmbedArgs(request: EmbedRequest): string[] {
  const args = [
    '-r',
    '-d', '%s',
    '-tagsfromfile', `%d/%F${SIDECAR_SUFFIX}`,
    ...EMBED_TAG_MAPPINGS,
    '-overwrite_original',
    '--ext', 'json'
  ];
  if (request.excludeSubstring) {
    args.push('-if', `$filename !~ /${escapePerlPattern(request.excludeSubstring)}/`);
  }
  args.push(request.rootDir);
  return args;
}

export class ExifTool implements FormatDetector, MetadataEmbedder {
  constructor(
    private readonly executable = 'exiftool',
    private readonly runner: ProcessRunner = spawnRunner
  ) {}

  version(): string | undefined {
    const result = this.runner.run(this.executable, ['-ver']);
    if (result.error || result.status !== 0) {
      logger.debug('exiftool probe failed', {
        executable: this.executable,
        error: result.error?.message ?? result.stderr.trim()
      });
      return undefined;
    }
    return result.stdout.trim() || undefined;
  }

  isAvailable(): boolean {
    return this.version() !== undefined;
  }

  detect(filePath: string): string | undefined {
    const result = this.runner.run(this.executable, ['-s3', '-MIMEType', filePath]);
    this.assertRan(result, filePath);
    if (result.status !== 0) {
      // exiftool exits non-zero for file types it cannot read
      logger.debug('exiftool did not identify file', { path: filePath, stderr: result.stderr.trim() });
    }
    const contentType = result.stdout.trim();
    return contentType || undefined;
  }

  embed(request: EmbedRequest): EmbedResult {
    const args = buildEmbedArgs(request);
    logger.debug('Running exiftool embed', { args });
    const result = this.runner.run(this.executable, args);
    if (result.error) {
      return { ok: false, output: result.error.message };
    }
    return {
      ok: result.status === 0,
      output: [result.stdout.trim(), result.stderr.trim()].filter(Boolean).join('\n')
    };
  }

  private assertRan(result: ProcessResult, filePath: string): void {
    if (result.error) {
      throw new Error(`exiftool could not run on ${filePath}: ${result.error.message}`);
    }
    if (result.status === null) {
      throw new Error(`exiftool was terminated while reading ${filePath}`);
    }
  }
}
