import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'fs/promises';
import * as path from 'path';
import { TailSession } from '../../../src/tail/TailSession.js';
import { FileNotFoundError } from '../../../src/tail/errors.js';
import { SeverityFilter } from '../../../src/tail/SeverityFilter.js';
import { Severity } from '../../../src/tail/Severity.js';
import { entry, makeTempDir, removeTempDir, replaceFile } from '../../helpers/logFiles.js';

describe('TailSession', () => {
  let dir: string;
  let file: string;

  beforeEach(async () => {
    dir = await makeTempDir();
    file = path.join(dir, 'laravel.log');
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('should reject opening a missing file', async () => {
    await expect(TailSession.open(file)).rejects.toBeInstanceOf(FileNotFoundError);
  });

  it('should deliver entries once the next header confirms them', async () => {
    await fs.writeFile(file, entry('ERROR', 'boom') + '[stacktrace...]\n' + entry('INFO', 'ok', '2024-01-02 09:00:00'));
    const session = await TailSession.open(file);

    const first = await session.poll();
    expect(first.change.type).toBe('grown');
    expect(first.records.map((r) => r.summary)).toEqual(['boom']);
    expect(first.records[0]?.body).toEqual(['[stacktrace...]']);
    expect(session.hasPending()).toBe(true);

    const flushed = session.flush();
    expect(flushed.records.map((r) => r.summary)).toEqual(['ok']);
  });

  it('should skip existing content when starting at the end', async () => {
    await fs.writeFile(file, entry('INFO', 'old'));
    const session = await TailSession.open(file, { startAt: 'end' });
    expect(session.getCursor().offset).toBe(Buffer.byteLength(entry('INFO', 'old')));

    await fs.appendFile(file, entry('INFO', 'new') + entry('INFO', 'newer'));
    const result = await session.poll();

    expect(result.records.map((r) => r.summary)).toEqual(['new']);
    expect(session.flush().records.map((r) => r.summary)).toEqual(['newer']);
  });

  it('should apply the filter as records are parsed', async () => {
    await fs.writeFile(file, entry('ERROR', 'e1') + entry('INFO', 'i1') + entry('ERROR', 'e2'));
    const filter = new SeverityFilter();
    filter.setEnabled(Severity.INFO, false);
    const session = await TailSession.open(file, { filter });

    const result = await session.poll();

    expect(result.records.map((r) => r.summary)).toEqual(['e1']);
    expect(result.filtered).toBe(1);
    expect(session.getFilter()).toBe(filter);
  });

  it('should rewind on truncation and drop the pending tail', async () => {
    const header = '[2024-01-01 10:00:00] local.INFO: ';
    const content = header + 'x'.repeat(500 - header.length - 1) + '\n';
    expect(Buffer.byteLength(content)).toBe(500);

    await fs.writeFile(file, content);
    const session = await TailSession.open(file);
    const first = await session.poll();
    expect(first.records).toEqual([]);
    expect(session.getCursor().offset).toBe(500);

    await fs.truncate(file, 0);
    const second = await session.poll();

    expect(second.change).toEqual({ type: 'truncated', size: 0 });
    expect(second.records).toEqual([]);
    expect(session.getCursor().offset).toBe(0);
    expect(session.hasPending()).toBe(false);
    expect(session.flush().records).toEqual([]);
  });

  it('should deliver the last entry of a rotated file before the new file', async () => {
    await fs.writeFile(file, entry('INFO', 'a') + entry('ERROR', 'last-before-rotation'));
    const session = await TailSession.open(file);
    expect((await session.poll()).records.map((r) => r.summary)).toEqual(['a']);
    const oldIdentity = session.getCursor().fileIdentity;

    await replaceFile(file, entry('INFO', 'fresh') + entry('INFO', 'next'));
    const result = await session.poll();

    expect(result.change.type).toBe('replaced');
    expect(result.previous.map((r) => r.summary)).toEqual(['last-before-rotation']);
    expect(result.records.map((r) => r.summary)).toEqual(['fresh']);
    expect(session.getCursor().fileIdentity).not.toBe(oldIdentity);
    expect(session.flush().records.map((r) => r.summary)).toEqual(['next']);
  });

  it('should drop an unterminated line of a rotated file', async () => {
    await fs.writeFile(file, entry('INFO', 'a') + '[2024-01-01 10:00:01] local.INFO: half');
    const session = await TailSession.open(file);
    expect((await session.poll()).records).toEqual([]);

    await replaceFile(file, entry('INFO', 'fresh'));
    const result = await session.poll();

    expect(result.previous.map((r) => r.summary)).toEqual(['a']);
    expect(result.records).toEqual([]);
    expect(session.flush().records.map((r) => r.summary)).toEqual(['fresh']);
  });

  it('should emit raw text that adds up to the file content', async () => {
    const prefix = 'no header here\r\n';
    const boom = '[2024-01-01 10:00:00] local.ERROR: boom\r\n#0 /app/index.php(12): run()\r\n';
    const ok = '[2024-01-01 10:00:01] local.INFO: ok\r\n';
    await fs.writeFile(file, prefix + boom + ok);
    const session = await TailSession.open(file, { maxReadBytes: 16 });

    const raw: string[] = [];
    for (;;) {
      const result = await session.poll();
      raw.push(...result.records.map((r) => r.rawText));
      if (result.bytesRead === 0) break;
    }
    expect(raw.join('')).toBe(prefix + boom);

    raw.push(...session.flush().records.map((r) => r.rawText));
    expect(raw.join('')).toBe(prefix + boom + ok);
  });

  it('should read large appends over several polls', async () => {
    await fs.writeFile(file, 'a'.repeat(25));
    const session = await TailSession.open(file, { maxReadBytes: 10 });

    const sizes: number[] = [];
    for (let i = 0; i < 4; i++) {
      sizes.push((await session.poll()).bytesRead);
    }
    expect(sizes).toEqual([10, 10, 5, 0]);
  });

  describe('idle flush', () => {
    it('should flush a complete pending entry once the file is quiet', async () => {
      let clock = 0;
      await fs.writeFile(file, entry('INFO', 'only'));
      const session = await TailSession.open(file, { idleFlushMs: 1000, now: () => clock });

      expect((await session.poll()).records).toEqual([]);

      clock = 500;
      expect((await session.poll()).records).toEqual([]);

      clock = 1000;
      const result = await session.poll();
      expect(result.change.type).toBe('unchanged');
      expect(result.records.map((r) => r.summary)).toEqual(['only']);
      expect(session.hasPending()).toBe(false);
    });

    it('should wait while the last line has no newline', async () => {
      let clock = 0;
      await fs.writeFile(file, '[2024-01-01 10:00:00] local.INFO: half');
      const session = await TailSession.open(file, { idleFlushMs: 1000, now: () => clock });
      await session.poll();

      clock = 60000;
      expect((await session.poll()).records).toEqual([]);
      expect(session.hasPending()).toBe(true);
    });

    it('should never flush when disabled', async () => {
      let clock = 0;
      await fs.writeFile(file, entry('INFO', 'only'));
      const session = await TailSession.open(file, { now: () => clock });
      await session.poll();

      clock = 60000;
      expect((await session.poll()).records).toEqual([]);
    });
  });
});
