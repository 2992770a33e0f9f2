import fs from 'fs/promises';
import path from 'path';
import {
  generateStorageName,
  getUploadDir,
  removeImage,
  sanitizeFileName,
  storeImage,
  sweepOrphanedUploads,
} from '../../src/services/upload.service';
import { image, listUploads, removeUploadDir } from '../helpers';

describe('Upload service', () => {
  afterEach(async () => {
    await removeUploadDir();
  });

  describe('sanitizeFileName()', () => {
    test.each([
      ['My Poster.PNG', 'my_poster.png'],
      ['../../etc/passwd.png', 'passwd.png'],
      ['C:\\Users\\me\\shot 1.jpg', 'shot_1.jpg'],
      ['__weird  name!!.gif', 'weird_name_.gif'],
      ['.hidden.png', 'hidden.png'],
      ['???', 'image'],
    ])('%p -> %p', (input, expected) => {
      expect(sanitizeFileName(input)).toBe(expected);
    });
  });

  describe('generateStorageName()', () => {
    test('prefixes the sanitized name with a timestamp and a random token', () => {
      expect(generateStorageName('Dune Poster.jpg')).toMatch(/^\d{13}_[0-9a-f]{8}_dune_poster\.jpg$/);
    });

    test('produces distinct names for the same upload', () => {
      expect(generateStorageName('a.png')).not.toBe(generateStorageName('a.png'));
    });
  });

  describe('storeImage()', () => {
    test('writes the buffer under the upload directory', async () => {
      const fileName = await storeImage(image('poster.png', 'png-bytes'));

      expect(fileName).toMatch(/_poster\.png$/);
      expect(await listUploads()).toEqual([fileName]);
      const stored = await fs.readFile(path.join(getUploadDir(), fileName), 'utf8');
      expect(stored).toBe('png-bytes');
    });
  });

  describe('removeImage()', () => {
    test('deletes a stored file', async () => {
      const fileName = await storeImage(image('poster.png'));
      await removeImage(fileName);
      expect(await listUploads()).toEqual([]);
    });

    test('ignores a missing file or an empty name', async () => {
      await expect(removeImage('does-not-exist.png')).resolves.toBeUndefined();
      await expect(removeImage(null)).resolves.toBeUndefined();
    });

    test('does not escalate a failed removal', async () => {
      // Un directorio con ese nombre hace fallar unlink
      await fs.mkdir(path.join(getUploadDir(), 'stuck.png'), { recursive: true });
      await expect(removeImage('stuck.png')).resolves.toBeUndefined();
      expect(await listUploads()).toEqual(['stuck.png']);
    });

    test('only touches files inside the upload directory', async () => {
      const fileName = await storeImage(image('poster.png'));
      await removeImage(`../${fileName}`);
      expect(await listUploads()).toEqual([]);
    });
  });

  describe('sweepOrphanedUploads()', () => {
    test('returns 0 when the upload directory does not exist', async () => {
      await expect(sweepOrphanedUploads(new Set())).resolves.toBe(0);
    });

    test('removes unreferenced files older than the grace period', async () => {
      const kept = await storeImage(image('kept.png'));
      const orphan = await storeImage(image('orphan.png'));
      const fresh = await storeImage(image('fresh.png'));

      const twoDaysAgo = new Date(Date.now() - 48 * 60 * 60 * 1000);
      await fs.utimes(path.join(getUploadDir(), kept), twoDaysAgo, twoDaysAgo);
      await fs.utimes(path.join(getUploadDir(), orphan), twoDaysAgo, twoDaysAgo);

      const removed = await sweepOrphanedUploads(new Set([kept]), 24);

      expect(removed).toBe(1);
      expect((await listUploads()).sort()).toEqual([fresh, kept].sort());
    });
  });
});
