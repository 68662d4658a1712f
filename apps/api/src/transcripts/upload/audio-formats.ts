/** MIME types we can map back to a format when the filename has no extension */
const FORMAT_BY_MIME_TYPE: ReadonlyMap<string, string> = new Map([
  ['audio/wav', 'wav'],
  ['audio/wave', 'wav'],
  ['audio/x-wav', 'wav'],
  ['audio/mpeg', 'mp3'],
  ['audio/mp3', 'mp3'],
  ['audio/mp4', 'm4a'],
  ['audio/x-m4a', 'm4a'],
  ['audio/flac', 'flac'],
  ['audio/x-flac', 'flac'],
  ['audio/ogg', 'ogg'],
]);

function getFileExtension(fileName: string): string {
  const lastDotIndex = fileName.lastIndexOf('.');
  if (lastDotIndex <= 0 || lastDotIndex === fileName.length - 1) {
    return '';
  }

  return fileName.slice(lastDotIndex + 1).toLowerCase();
}

/**
 * The format an upload claims to be: its lower-cased extension, or, for a
 * name without one, the format its MIME type maps to. Empty string when
 * neither says anything.
 */
export function resolveAudioFormat(
  fileName: string,
  mimeType: string | undefined,
): string {
  const extension = getFileExtension(fileName);
  if (extension) {
    return extension;
  }

  const normalizedMime = (mimeType ?? '').split(';')[0].trim().toLowerCase();
  return FORMAT_BY_MIME_TYPE.get(normalizedMime) ?? '';
}
