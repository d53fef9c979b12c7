/**
 * Jest Unit Tests for upload content sniffing
 */

import { checkUploadContent, sniffContent, type ContentKind } from '../content-sniff.js';

const ZIP = Buffer.from([0x50, 0x4b, 0x03, 0x04, 0x14, 0x00]);
const OLE = Buffer.from([0xd0, 0xcf, 0x11, 0xe0, 0xa1, 0xb1, 0x1a, 0xe1, 0x00, 0x00]);

describe('sniffContent', () => {
  test.each<[string, Buffer, ContentKind]>([
    ['an xlsx archive', ZIP, 'zip'],
    ['a legacy workbook', OLE, 'ole'],
    ['CSV with CRLF line endings', Buffer.from('a,b\r\n1,2\r\n'), 'text'],
    ['tab-separated UTF-8 with a BOM', Buffer.from('\uFEFFnom\tville\nZoé\tLyon\n'), 'text'],
    ['a NUL byte', Buffer.from([0x61, 0x00, 0x62]), 'binary'],
    ['an executable header', Buffer.from([0x4d, 0x5a, 0x90, 0x00]), 'binary'],
  ])('%s', (_name, bytes, expected) => {
    expect(sniffContent(bytes)).toBe(expected);
  });

  test('only looks at the leading bytes', () => {
    const bytes = Buffer.concat([Buffer.alloc(2048, 0x61), Buffer.from([0x00])]);

    expect(sniffContent(bytes)).toBe('text');
  });
});

describe('checkUploadContent', () => {
  test('accepts content that matches the extension', () => {
    expect(checkUploadContent('sales.csv', Buffer.from('a,b\n1,2\n'))).toBeNull();
    expect(checkUploadContent('sales.xlsx', ZIP)).toBeNull();
    expect(checkUploadContent('sales.xls', OLE)).toBeNull();
    expect(checkUploadContent('SALES.XLS', Buffer.from('a\tb\n1\t2\n'))).toBeNull();
  });

  test('rejects a legacy workbook named .xlsx', () => {
    expect(checkUploadContent('sales.xlsx', OLE)).toBe('File content does not match its .xlsx extension.');
  });

  test('rejects binary content whatever the extension', () => {
    expect(checkUploadContent('sales.xls', Buffer.from([0x00, 0x01]))).toBe(
      'Invalid file type: the content is not CSV or Excel. Only CSV and Excel files (.csv, .xlsx, .xls) are allowed.'
    );
  });
});
