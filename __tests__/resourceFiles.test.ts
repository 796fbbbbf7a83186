import { getModResourceFile, getModResourceIconName, pluginFileUrl } from '@/lib/resourceFiles';
import { fakeContext, storedFile } from './helpers/fakeContext';

describe('resource files', () => {
  it('skips directory entries, empty files and files without a MIME type', async () => {
    const ctx = fakeContext({
      files: [
        storedFile({ filename: '.', filesize: 0, mimetype: null }),
        storedFile({ filename: 'empty.pdf', filesize: 0, mimetype: 'application/pdf' }),
        storedFile({ filename: 'nomime.bin', mimetype: null }),
        storedFile({ filename: 'notes.pdf', mimetype: 'application/pdf' }),
        storedFile({ filename: 'later.txt', mimetype: 'text/plain' }),
      ],
    });
    const file = await getModResourceFile(ctx, 50);
    expect(file?.filename).toBe('notes.pdf');
    expect(await getModResourceIconName(ctx, 50)).toBe('pdf');
  });

  it('returns null without a usable file', async () => {
    const ctx = fakeContext({ files: [storedFile({ filename: '.', filesize: 0, mimetype: null })] });
    expect(await getModResourceFile(ctx, 50)).toBeNull();
    expect(await getModResourceIconName(ctx, 50)).toBeNull();
    expect(await getModResourceIconName(fakeContext(), 50)).toBeNull();
  });

  it('only looks in the given context', async () => {
    const ctx = fakeContext({ files: [storedFile({ contextId: 51, filename: 'other.pdf', mimetype: 'application/pdf' })] });
    expect(await getModResourceIconName(ctx, 50)).toBeNull();
  });

  it('maps known MIME types', async () => {
    const cases: Array<[string, string, string]> = [
      ['photo.jpg', 'image/jpeg', 'image'],
      ['diagram.png', 'image/png', 'image'],
      ['readme', 'text/plain', 'txt'],
      ['index.htm', 'text/html', 'html'],
    ];
    for (const [filename, mimetype, expected] of cases) {
      const ctx = fakeContext({ files: [storedFile({ filename, mimetype })] });
      expect(await getModResourceIconName(ctx, 50)).toBe(expected);
    }
  });

  it('falls back to the extension and folds office formats', async () => {
    const cases: Array<[string, string]> = [
      ['report.docx', 'doc'],
      ['budget.xlsx', 'xls'],
      ['budget.ods', 'xls'],
      ['slides.pptx', 'ppt'],
      ['slides.odp', 'ppt'],
      ['letter.odf', 'doc'],
      ['backup.tar.gz', 'gz'],
    ];
    for (const [filename, expected] of cases) {
      const ctx = fakeContext({ files: [storedFile({ filename, mimetype: 'application/x-unknown' })] });
      expect(await getModResourceIconName(ctx, 50)).toBe(expected);
    }
  });

  it('treats prototype names as ordinary MIME types and extensions', async () => {
    const cases: Array<[string, string, string]> = [
      ['a.pdf', 'toString', 'pdf'],
      ['report.constructor', 'application/x-unknown', 'constructor'],
      ['notes.__proto__', 'hasOwnProperty', '__proto__'],
    ];
    for (const [filename, mimetype, expected] of cases) {
      const ctx = fakeContext({ files: [storedFile({ filename, mimetype })] });
      expect(await getModResourceIconName(ctx, 50)).toBe(expected);
    }
  });

  it('takes the whole name after a leading dot as the extension', async () => {
    const ctx = fakeContext({ files: [storedFile({ filename: '.htaccess', mimetype: 'application/x-unknown' })] });
    expect(await getModResourceIconName(ctx, 50)).toBe('htaccess');
  });

  it('builds the file download URL', () => {
    const file = storedFile({ filename: 'my notes.pdf', filepath: '/week1/', itemId: 0 });
    expect(pluginFileUrl('https://lms.test', file)).toBe('https://lms.test/pluginfile.php/50/mod_resource/content/0/week1/my%20notes.pdf');
  });
});
