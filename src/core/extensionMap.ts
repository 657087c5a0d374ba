/**
 * Content type -> canonical file extension. Anything not listed is unknown
 * and is never renamed.
 */
export const EXTENSION_MAP: Readonly<Record<string, string>> = {
  'image/jpeg': 'jpg',
  'image/png': 'png',
  'image/gif': 'gif',
  'image/webp': 'webp',
  'image/heic': 'heic',
  'image/heif': 'heif',
  'image/tiff': 'tif',
  'image/bmp': 'bmp',
  'image/x-adobe-dng': 'dng',
  'video/mp4': 'mp4',
  'video/quicktime': 'mov',
  'video/x-msvideo': 'avi',
  'video/x-matroska': 'mkv',
  'video/3gpp': '3gp',
  'video/mpeg': 'mpg',
  'video/webm': 'webm'
};

/** Extensions assumed correct; detection is skipped for them. */
export const TRUSTED_EXTENSIONS: ReadonlySet<string> = new Set(['jpg', 'jpeg']);

export function extensionForContentType(contentType: string): string | undefined {
  const key = contentType.trim().toLowerCase();
  return Object.prototype.hasOwnProperty.call(EXTENSION_MAP, key) ? EXTENSION_MAP[key] : undefined;
}

export function isTrustedExtension(extension: string): boolean {
  return TRUSTED_EXTENSIONS.has(extension.toLowerCase());
}
