import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdtemp, readFile, readdir, rm } from 'fs/promises';
import os from 'os';
import path from 'path';
import { Writable } from 'stream';
import { ConsoleSink, FileSink, createMessageSink } from '../../src/output/sinks.js';
import type { DeliveredMessage } from '../../src/retrieval/types.js';
import { message } from '../helpers/memory-sink.js';

const bodyOnly = (m: DeliveredMessage) => m.body;

describe('Message sinks', () => {
  describe('ConsoleSink', () => {
    function capture() {
      const chunks: string[] = [];
      const stream = new Writable({
        write(chunk: Buffer, _encoding, callback) {
          chunks.push(chunk.toString('utf8'));
          callback();
        },
      });
      return { stream, output: () => chunks.join('') };
    }

    it('should separate multi-line formats with a blank line', async () => {
      const { stream, output } = capture();
      const sink = new ConsoleSink(bodyOnly, 'plain', stream);

      await sink.write(message(1));
      await sink.write(message(2));

      expect(output()).toBe('m1\n\nm2\n');
    });

    it('should write json as one line per message', async () => {
      const { stream, output } = capture();
      const sink = new ConsoleSink(bodyOnly, 'json', stream);

      await sink.write(message(1));
      await sink.write(message(2));

      expect(output()).toBe('m1\nm2\n');
    });
  });

  describe('FileSink', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(path.join(os.tmpdir(), 'queuetap-sink-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('should write plain messages to one file with the delimiter between them', async () => {
      const file = path.join(dir, 'out.txt');
      const sink = new FileSink({
        file,
        format: 'plain',
        formatter: bodyOnly,
        messagesPerFile: 0,
        messageDelimiter: '---',
      });

      await sink.write(message(1));
      await sink.write(message(2));
      await sink.close();

      await expect(readFile(file, 'utf8')).resolves.toBe('m1\n---\nm2\n');
      expect(sink.files).toEqual([file]);
    });

    it('should rotate files every messagesPerFile messages', async () => {
      const file = path.join(dir, 'out.jsonl');
      const sink = new FileSink({
        file,
        format: 'json',
        formatter: bodyOnly,
        messagesPerFile: 2,
        messageDelimiter: '\n',
      });

      for (let tag = 1; tag <= 5; tag++) {
        await sink.write(message(tag));
      }
      await sink.close();

      expect((await readdir(dir)).sort()).toEqual(['out.0.jsonl', 'out.1.jsonl', 'out.2.jsonl']);
      await expect(readFile(path.join(dir, 'out.0.jsonl'), 'utf8')).resolves.toBe('m1\nm2\n');
      await expect(readFile(path.join(dir, 'out.1.jsonl'), 'utf8')).resolves.toBe('m3\nm4\n');
      await expect(readFile(path.join(dir, 'out.2.jsonl'), 'utf8')).resolves.toBe('m5\n');
    });

    it('should not rotate when the requested count fits in one file', async () => {
      const file = path.join(dir, 'out.jsonl');
      const sink = new FileSink({
        file,
        format: 'json',
        formatter: bodyOnly,
        messagesPerFile: 5,
        messageDelimiter: '\n',
        messageCount: 2,
      });

      await sink.write(message(1));
      await sink.write(message(2));
      await sink.close();

      expect(await readdir(dir)).toEqual(['out.jsonl']);
    });

    it('should not create a file when nothing was written', async () => {
      const sink = new FileSink({
        file: path.join(dir, 'empty.txt'),
        format: 'plain',
        formatter: bodyOnly,
        messagesPerFile: 0,
        messageDelimiter: '\n',
      });

      await sink.close();

      expect(await readdir(dir)).toEqual([]);
    });
  });

  describe('createMessageSink', () => {
    const fileConfig = { messagesPerFile: 0, messageDelimiter: '\n' };

    it('should write to stdout without an output file', () => {
      expect(createMessageSink({ format: 'plain' }, fileConfig)).toBeInstanceOf(ConsoleSink);
    });

    it('should write to a file when one is given', () => {
      const sink = createMessageSink({ format: 'json', outputFile: path.join(os.tmpdir(), 'unused.jsonl') }, fileConfig);

      expect(sink).toBeInstanceOf(FileSink);
    });
  });
});
