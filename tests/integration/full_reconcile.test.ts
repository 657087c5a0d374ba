import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { CapabilityUnavailableError, EXIT_CODES, exitCodeForSummary } from '../../src/core/exitStatus.js';
import { ReconcileRunner } from '../../src/core/reconcileRunner.js';
import { tallyMatchResults } from '../../src/core/runReport.js';
import { logger } from '../../src/logger.js';
import type { ReconcileConfig, RunSummary } from '../../src/types.js';
import { FakeDetector, FakeEmbedder } from '../fixtures/fakeCapabilities.js';
import { createExportTree, listTree, relativeTo, removeTree, silenceConsole, testConfig } from '../fixtures/exportTree.js';

const EXPORT = [
  'Photos/trip.jpg',
  'Photos/trip.jpg.supplemental-meta.json',
  'Photos/img0002(3).jpg',
  'Photos/img0002.jpg.supplemental-metadata(3).json',
  'Photos/longfilenamethatwastru.jpg',
  'Photos/longfilenamethatwastr.json',
  'Photos/clip.mp4',
  'Photos/clip.mp4.supplemental-metadata.json',
  'Photos/dup.png',
  'Photos/dup.jpg.supplemental-metadata.json',
  'Photos/dup.gif.supplemental-metadata.json',
  'Photos/metadata.json',
  'Photos/nosidecar.gif'
];

const RECONCILED = [
  'Photos/clip.mov',
  'Photos/clip.mov.supplemental-metadata.json',
  'Photos/dup.gif.supplemental-metadata.json',
  'Photos/dup.jpg.supplemental-metadata.json',
  'Photos/dup.png',
  'Photos/img0002(3).jpg',
  'Photos/img0002(3).jpg.supplemental-metadata.json',
  'Photos/longfilenamethatwastru.jpg',
  'Photos/longfilenamethatwastru.jpg.supplemental-metadata.json',
  'Photos/metadata.json',
  'Photos/nosidecar.gif',
  'Photos/trip.jpg',
  'Photos/trip.jpg.supplemental-metadata.json'
];

const EXPECTED_MOVES = [
  ['Photos/trip.jpg.supplemental-meta.json', 'Photos/trip.jpg.supplemental-metadata.json'],
  ['Photos/img0002.jpg.supplemental-metadata(3).json', 'Photos/img0002(3).jpg.supplemental-metadata.json'],
  ['Photos/clip.mp4', 'Photos/clip.mov'],
  ['Photos/clip.mp4.supplemental-metadata.json', 'Photos/clip.mov.supplemental-metadata.json'],
  ['Photos/longfilenamethatwastr.json', 'Photos/longfilenamethatwastru.jpg.supplemental-metadata.json']
];

function detector(options: { available?: boolean } = {}): FakeDetector {
  return new FakeDetector(
    {
      'clip.mp4': 'video/quicktime',
      'clip.mov': 'video/quicktime',
      'dup.png': 'image/png',
      'nosidecar.gif': 'image/gif'
    },
    options
  );
}

function moves(root: string, summary: RunSummary): string[][] {
  return summary.actions.map(action => [relativeTo(root, action.from), relativeTo(root, action.to)]);
}

describe('Integration: full reconciliation', () => {
  let root: string;
  let outside: string;

  beforeEach(async () => {
    silenceConsole();
    root = await createExportTree(EXPORT);
    outside = await fs.mkdtemp(path.join(os.tmpdir(), 'sidecar-reconcile-out-'));
  });

  afterEach(async () => {
    logger.setLogFile(undefined);
    jest.restoreAllMocks();
    await removeTree(root);
    await removeTree(outside);
  });

  const runWith = (config: Partial<ReconcileConfig> = {}, fakes = { detector: detector(), embedder: new FakeEmbedder() }) =>
    new ReconcileRunner(testConfig(root, config), fakes).run();

  it('normalizes, corrects extensions and matches in one run', async () => {
    const summary = await runWith();

    expect(await listTree(root)).toEqual(RECONCILED);
    expect(moves(root, summary)).toEqual(EXPECTED_MOVES);
    expect(summary.actions.every(action => action.status === 'renamed')).toBe(true);
    expect(summary.phases.map(phase => phase.phase)).toEqual(['normalize', 'extensions', 'match']);
    expect(tallyMatchResults(summary)).toEqual({
      AlreadyCorrect: 2,
      UniqueCandidateFound: 1,
      MultipleCandidatesFound: 1,
      LegacyTruncatedMatch: 1,
      AbbreviatedSuffixMatch: 0,
      NoMatchFound: 1
    });
    expect(exitCodeForSummary(summary)).toBe(EXIT_CODES.SUCCESS);
  });

  it('changes nothing when run a second time', async () => {
    await runWith();
    const second = await runWith();

    expect(second.actions).toEqual([]);
    expect(await listTree(root)).toEqual(RECONCILED);
  });

  it('plans the same moves in dry-run mode without touching the tree', async () => {
    const summary = await runWith({ dryRun: true });

    expect(await listTree(root)).toEqual([...EXPORT].sort());
    expect(moves(root, summary)).toEqual(EXPECTED_MOVES);
    expect(summary.actions.every(action => action.status === 'planned')).toBe(true);
  });

  it('records ambiguous candidates in the diagnostic log', async () => {
    const logFile = path.join(outside, 'reconcile.log');
    logger.setLogFile(logFile);

    await runWith({ logFile });

    const records = (await fs.readFile(logFile, 'utf-8')).trim().split('\n').map(line => JSON.parse(line));
    const ambiguous = records.filter(record => record.msg === 'Multiple sidecar candidates, leaving all in place');
    expect(ambiguous).toHaveLength(1);
    expect(ambiguous[0].level).toBe('warn');
    expect(relativeTo(root, ambiguous[0].content)).toBe('Photos/dup.png');
    expect(ambiguous[0].candidates.map((candidate: string) => relativeTo(root, candidate))).toEqual([
      'Photos/dup.gif.supplemental-metadata.json',
      'Photos/dup.jpg.supplemental-metadata.json'
    ]);
  });

  it('keeps a log file written inside the tree out of every phase', async () => {
    const logFile = path.join(root, 'Photos', 'reconcile.log');
    logger.setLogFile(logFile);
    const fake = detector();

    const summary = await runWith({ logFile }, { detector: fake, embedder: new FakeEmbedder() });

    expect(fake.calls.map(call => path.basename(call))).toEqual(['clip.mp4', 'dup.png', 'nosidecar.gif']);
    const matched = summary.phases.find(phase => phase.phase === 'match')?.matches ?? [];
    expect(matched.some(match => match.content === logFile)).toBe(false);
  });

  it('refuses to start when the format detector is missing', async () => {
    const fakes = { detector: detector({ available: false }), embedder: new FakeEmbedder() };

    await expect(runWith({}, fakes)).rejects.toBeInstanceOf(CapabilityUnavailableError);
    expect(await listTree(root)).toEqual([...EXPORT].sort());
  });

  it('hands the tree to the embedder and fails the run when embedding fails', async () => {
    const embedder = new FakeEmbedder({ ok: false, output: 'Error: exiftool exited with status 1' });

    const summary = await runWith({ embedMetadata: true }, { detector: detector(), embedder });

    expect(embedder.requests).toEqual([{ rootDir: root, excludeSubstring: 'edited' }]);
    expect(summary.phases.map(phase => phase.phase)).toEqual(['normalize', 'extensions', 'match', 'embed']);
    expect(exitCodeForSummary(summary)).toBe(EXIT_CODES.RUN_FAILURE);
  });
});
