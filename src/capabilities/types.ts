/**
 * External capabilities the reconciliation phases depend on. Production code
 * wires them to ExifTool; tests pass fakes.
 */

export interface ProcessResult {
  status: number | null;
  stdout: string;
  stderr: string;
  error?: Error;
}

export interface ProcessRunner {
  run(command: string, args: string[]): ProcessResult;
}

export interface FormatDetector {
  isAvailable(): boolean;
  /**
   * Content type of the file's encoded data (`image/png`), or undefined when
   * the detector recognises nothing. Throws when the detector itself fails.
   */
  detect(filePath: string): string | undefined;
}

export interface EmbedRequest {
  rootDir: string;
  excludeSubstring: string;
}

export interface EmbedResult {
  ok: boolean;
  output: string;
}

export interface MetadataEmbedder {
  isAvailable(): boolean;
  embed(request: EmbedRequest): EmbedResult;
}

export interface Capabilities {
  detector: FormatDetector;
  embedder: MetadataEmbedder;
}
