import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { Command } from 'commander';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import {
  formatSummary,
  loadPriors,
  runCli,
  runDecodeCommand,
  runEncodeCommand,
} from '../src/cli.js';
import { InvalidPriorError, PrecisionOverflowError } from '../src/errors.js';

let tempDir: string;

beforeEach(async () => {
  tempDir = await mkdtemp(path.join(tmpdir(), 'dyadic-coder-cli-'));
});

afterEach(async () => {
  await rm(tempDir, { recursive: true, force: true });
});

async function writeJson(name: string, value: unknown): Promise<string> {
  const filePath = path.join(tempDir, name);
  await writeFile(filePath, JSON.stringify(value), 'utf8');
  return filePath;
}

describe('runEncodeCommand', () => {
  it('encodes text with a prior file', async () => {
    const priorsPath = await writeJson('priors.json', { a: 1, b: 1, c: 1 });
    const result = await runEncodeCommand({ text: 'aabbaacc', priorsPath });

    expect(result.code).toBe('00011110011110010');
    expect(formatSummary(result)).toEqual([
      'symbols:     8',
      'code bits:   17',
      'ideal bits:  14.21',
      'bits/symbol: 2.125',
      'container:   39 bytes',
    ]);
  });

  it('writes a container that decodes back to the text', async () => {
    const inputPath = path.join(tempDir, 'message.txt');
    const outputPath = path.join(tempDir, 'message.aric');
    const decodedPath = path.join(tempDir, 'decoded.txt');
    await writeFile(inputPath, 'abracadabra', 'utf8');

    await runEncodeCommand({ inputPath, outputPath, alphabet: 'abcdr' });
    const text = await runDecodeCommand({ inputPath: outputPath, outputPath: decodedPath });

    expect(text).toBe('abracadabra');
    expect(await readFile(decodedPath, 'utf8')).toBe('abracadabra');
  });

  it('rejects invalid prior files', async () => {
    const zeroPath = await writeJson('zero.json', { a: 0 });
    await expect(loadPriors(zeroPath)).rejects.toThrow(InvalidPriorError);

    const listPath = await writeJson('list.json', [1, 2]);
    await expect(runEncodeCommand({ text: 'a', priorsPath: listPath })).rejects.toThrow(
      InvalidPriorError
    );
  });

  it('requires some input', async () => {
    await expect(runEncodeCommand({})).rejects.toThrow(/Nothing to encode/);
  });

  it('passes the precision bound to the encoder', async () => {
    await expect(
      runEncodeCommand({ text: 'aabbaacc', alphabet: 'abc', maxPrecisionBits: 8 })
    ).rejects.toThrow(PrecisionOverflowError);
  });
});

describe('runCli', () => {
  it('prints the code for the encode command', async () => {
    const messages: string[] = [];
    const stdout = vi
      .spyOn(process.stdout, 'write')
      .mockImplementation((chunk) => {
        messages.push(String(chunk));
        return true;
      });
    const stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    try {
      await runCli(['node', 'dyadic-coder', 'encode', 'aabbaacc', '--alphabet', 'abc']);
      expect(messages).toEqual(['00011110011110010\n']);
    } finally {
      stdout.mockRestore();
      stderr.mockRestore();
    }
  });

  it('swallows commander help-displayed rejections', async () => {
    const error = Object.assign(new Error('help'), {
      code: 'commander.helpDisplayed',
    });
    const parseSpy = vi
      .spyOn(Command.prototype, 'parseAsync')
      .mockRejectedValue(error);
    await expect(runCli(['node', 'dyadic-coder'])).resolves.toBeUndefined();
    parseSpy.mockRestore();
  });
});
