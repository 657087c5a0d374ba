/**
 * In-process stand-ins for exiftool
 */

import * as path from 'path';
import type {
  EmbedRequest,
  EmbedResult,
  FormatDetector,
  MetadataEmbedder,
  ProcessResult,
  ProcessRunner
} from '../../src/capabilities/types.js';

/**
 * Answers by file name; names listed in `failing` make detect throw.
 */
export class FakeDetector implements FormatDetector {
  readonly calls: string[] = [];

  constructor(
    private readonly types: Record<string, string> = {},
    private readonly options: { available?: boolean; failing?: string[] } = {}
  ) {}

  isAvailable(): boolean {
    return this.options.available ?? true;
  }

  detect(filePath: string): string | undefined {
    this.calls.push(filePath);
    const name = path.basename(filePath);
    if (this.options.failing?.includes(name)) {
      throw new Error(`detector crashed on ${name}`);
    }
    return this.types[name];
  }
}

export class FakeEmbedder implements MetadataEmbedder {
  readonly requests: EmbedRequest[] = [];

  constructor(
    private readonly result: EmbedResult = { ok: true, output: '1 image files updated' },
    private readonly available = true
  ) {}

  isAvailable(): boolean {
    return this.available;
  }

  embed(request: EmbedRequest): EmbedResult {
    this.requests.push(request);
    return this.result;
  }
}

export interface RecordedCall {
  command: string;
  args: string[];
}

/**
 * Replays queued results in order; an empty queue answers with success and no output.
 */
export class FakeProcessRunner implements ProcessRunner {
  readonly calls: RecordedCall[] = [];

  constructor(private readonly results: ProcessResult[] = []) {}

  run(command: string, args: string[]): ProcessResult {
    this.calls.push({ command, args });
    return this.results.shift() ?? { status: 0, stdout: '', stderr: '' };
  }
}
