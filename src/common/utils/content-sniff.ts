/**
 * Upload content sniffing
 *
 * Recognises what an upload actually contains from its leading bytes, so a
 * renamed executable or archive is refused before anything is stored.
 */

import { UPLOAD_LIMITS } from '../constants.js';
import { extensionOf } from '../schemas/index.js';

export type ContentKind = 'zip' | 'ole' | 'text' | 'binary';

/** Local file header of a zip archive (.xlsx) */
const ZIP_SIGNATURE = [0x50, 0x4b, 0x03, 0x04];
/** Compound File Binary header (legacy .xls) */
const OLE_SIGNATURE = [0xd0, 0xcf, 0x11, 0xe0, 0xa1, 0xb1, 0x1a, 0xe1];

/** Control bytes allowed in text: tab, line feed, form feed, carriage return */
const TEXT_CONTROL_BYTES = new Set([0x09, 0x0a, 0x0c, 0x0d]);

const EXPECTED_KINDS: Record<string, readonly ContentKind[]> = {
  '.csv': ['text'],
  '.xlsx': ['zip'],
  // Spreadsheet tools also save HTML or tab-separated text under .xls
  '.xls': ['ole', 'zip', 'text'],
};

function startsWith(head: Uint8Array, signature: readonly number[]): boolean {
  return head.length >= signature.length && signature.every((byte, index) => head[index] === byte);
}

export function sniffContent(bytes: Uint8Array): ContentKind {
  const head = bytes.subarray(0, UPLOAD_LIMITS.SNIFF_BYTES);
  if (startsWith(head, ZIP_SIGNATURE)) {
    return 'zip';
  }
  if (startsWith(head, OLE_SIGNATURE)) {
    return 'ole';
  }
  for (const byte of head) {
    if ((byte < 0x20 && !TEXT_CONTROL_BYTES.has(byte)) || byte === 0x7f) {
      return 'binary';
    }
  }
  return 'text';
}

/**
 * Rejection message for content that is not a spreadsheet or does not match
 * the file extension; null when the upload may be decoded.
 */
export function checkUploadContent(fileName: string, bytes: Uint8Array): string | null {
  const kind = sniffContent(bytes);
  if (kind === 'binary') {
    return 'Invalid file type: the content is not CSV or Excel. Only CSV and Excel files (.csv, .xlsx, .xls) are allowed.';
  }

  const extension = extensionOf(fileName);
  const expected = EXPECTED_KINDS[extension];
  if (expected !== undefined && !expected.includes(kind)) {
    return `File content does not match its ${extension} extension.`;
  }
  return null;
}
