/**
 * Usage text for the command line
 */

const HELP_LINES = [
  'Export sidecar reconciler',
  '',
  'Usage: sidecar-reconcile [options] <export-dir>',
  '',
  'Repairs sidecar metadata names, corrects content file extensions, pairs every',
  'content file with <name>.supplemental-metadata.json and embeds the metadata.',
  '',
  'Phases (in order):',
  '  normalize    Repair abbreviated markers and misplaced (N) counters in sidecar names',
  '  extensions   Rename content files whose extension does not match their format',
  '  match        Rename each content file\'s sidecar to the canonical name',
  '  embed        Write sidecar metadata into the content files with exiftool',
  '',
  'Options:',
  '  -n, --dry-run            Report renames without touching the tree',
  '  --no-extensions          Skip the extensions phase (alias: --skip-extensions)',
  '  --no-embed               Skip the embed phase (alias: --skip-embed)',
  '  --exclude <substring>    Leave names containing this (case-sensitive) out of embedding',
  '                           (default: edited; pass "" to embed everything)',
  '  --log-file <path>        Append a JSON-lines diagnostic log to this file',
  '  --report <path>          Write a YAML report of the run',
  '  --exiftool <path>        exiftool executable (default: exiftool)',
  '  -d, --debug              Verbose logging',
  '  -h, --help               Show this help message',
  '',
  'Environment Variables:',
  '  RECONCILE_LOG_FILE',
  '  RECONCILE_EXCLUDE',
  '  EXIFTOOL_PATH',
  '  DEBUG',
  '',
  'Exit codes:',
  '  0  success   1  file or embed errors   2  invalid usage   3  exiftool unavailable',
  '',
  'Examples:',
  '  # Preview every rename',
  '  sidecar-reconcile --dry-run ./Takeout/Photos',
  '',
  '  # Fix names only, keep a diagnostic log',
  '  sidecar-reconcile --no-embed --log-file reconcile.log ./Takeout/Photos'
];

export function helpText(): string {
  return HELP_LINES.join('\n');
}

export function showHelp(): void {
  console.log(helpText());
}
