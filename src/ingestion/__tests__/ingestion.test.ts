import test from 'node:test';
import assert from 'node:assert/strict';
import { mkdtemp, readdir, readFile, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { IngestionError } from '../../lib/errors';
import { hashContent, Ingestion, mediaKindFor, sanitizeFileName } from '../index';

async function withUploadDir(run: (dir: string) => Promise<void>): Promise<void> {
  const dir = await mkdtemp(path.join(os.tmpdir(), 'ingestion-'));
  try {
    await run(path.join(dir, 'uploads'));
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

test('mediaKindFor: maps supported extensions case-insensitively', () => {
  assert.equal(mediaKindFor('zadost.PDF'), 'pdf');
  assert.equal(mediaKindFor('scan.jpeg'), 'image');
  assert.equal(mediaKindFor('scan.png'), 'image');
  assert.equal(mediaKindFor('form.docx'), 'docx');
  assert.equal(mediaKindFor('notes.txt'), 'text');
  assert.equal(mediaKindFor('archive.zip'), null);
  assert.equal(mediaKindFor('README'), null);
});

test('sanitizeFileName: strips paths and diacritics', () => {
  assert.equal(sanitizeFileName('../../etc/passwd.txt'), 'passwd.txt');
  assert.equal(sanitizeFileName('C:\\Users\\jan\\Žádost o užívání.pdf'), 'Zadost_o_uzivani.pdf');
  assert.equal(sanitizeFileName('.hidden.txt'), 'hidden.txt');
  assert.equal(sanitizeFileName('???'), 'upload');
});

test('hashContent: sha256 hex digest', () => {
  assert.equal(
    hashContent(Buffer.from('abc')),
    'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad'
  );
});

test('Ingestion.accept: stores the bytes and describes the request', async () => {
  await withUploadDir(async (dir) => {
    const ingestion = new Ingestion(dir);
    const content = Buffer.from('Žadatel: Jan Novák');

    const { request, storedPath } = await ingestion.accept('žádost.txt', content);

    assert.match(request.id, /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    assert.equal(request.fileName, 'zadost.txt');
    assert.equal(request.mediaKind, 'text');
    assert.equal(request.contentHash, hashContent(content));
    assert.equal(storedPath, path.join(dir, `${request.id}_zadost.txt`));
    assert.deepEqual(await readFile(storedPath), content);
  });
});

test('Ingestion.accept: identical bytes get distinct ids and one hash', async () => {
  await withUploadDir(async (dir) => {
    const ingestion = new Ingestion(dir);
    const content = Buffer.from('same');

    const first = await ingestion.accept('a.txt', content);
    const second = await ingestion.accept('a.txt', content);

    assert.notEqual(first.request.id, second.request.id);
    assert.equal(first.request.contentHash, second.request.contentHash);
  });
});

test('Ingestion.accept: unsupported and empty files are rejected without storing', async () => {
  await withUploadDir(async (dir) => {
    const ingestion = new Ingestion(dir);

    await assert.rejects(ingestion.accept('virus.exe', Buffer.from('x')), IngestionError);
    await assert.rejects(ingestion.accept('empty.pdf', Buffer.alloc(0)), /File is empty/);
    assert.equal(await ingestion.purge(), 0);
  });
});

test('Ingestion.purge: removes stored uploads', async () => {
  await withUploadDir(async (dir) => {
    const ingestion = new Ingestion(dir);
    await ingestion.accept('a.txt', Buffer.from('a'));
    await ingestion.accept('b.txt', Buffer.from('b'));

    assert.equal(await ingestion.purge(), 2);
    assert.deepEqual(await readdir(dir), []);
  });
});
