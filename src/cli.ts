#!/usr/bin/env node
import { readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import process from 'node:process';
import { pathToFileURL } from 'node:url';

import { Command } from 'commander';

import { Compressor, type CompressionResult } from './compressor.js';
import { InvalidPriorError } from './errors.js';
import { parsePriorTable, type PriorTable } from './format/prior-table.js';

export interface EncodeCommandOptions {
  /** Text to encode; ignored when inputPath is set */
  text?: string;
  inputPath?: string;
  priorsPath?: string;
  alphabet?: string;
  outputPath?: string;
  maxPrecisionBits?: number;
}

export interface DecodeCommandOptions {
  inputPath: string;
  outputPath?: string;
}

/**
 * Read a prior table JSON file (symbol → positive integer count).
 */
export async function loadPriors(priorsPath: string): Promise<PriorTable> {
  const raw = await readFile(path.resolve(priorsPath), 'utf8');
  return parsePriorTable(
    raw,
    (message) => new InvalidPriorError(`${priorsPath}: ${message}`)
  );
}

/**
 * Human-readable summary of an encode run.
 */
export function formatSummary(result: CompressionResult): string[] {
  const lines = [
    `symbols:     ${result.symbolCount}`,
    `code bits:   ${result.code.length}`,
    `ideal bits:  ${result.idealBits.toFixed(2)}`,
  ];
  if (result.symbolCount > 0) {
    lines.push(
      `bits/symbol: ${(result.code.length / result.symbolCount).toFixed(3)}`
    );
  }
  lines.push(`container:   ${result.compressedSize} bytes`);
  return lines;
}

export async function runEncodeCommand(
  options: EncodeCommandOptions
): Promise<CompressionResult> {
  const text = options.inputPath
    ? await readFile(path.resolve(options.inputPath), 'utf8')
    : options.text;
  if (text === undefined) {
    throw new Error('Nothing to encode: pass text or --input <file>.');
  }

  const priors = options.priorsPath
    ? await loadPriors(options.priorsPath)
    : undefined;

  const compressor = new Compressor({
    priors,
    alphabet: options.alphabet,
    maxPrecisionBits: options.maxPrecisionBits,
  });
  const result = compressor.compress(text);

  if (options.outputPath) {
    await writeFile(path.resolve(options.outputPath), result.data);
  }
  return result;
}

export async function runDecodeCommand(
  options: DecodeCommandOptions
): Promise<string> {
  const data = await readFile(path.resolve(options.inputPath));
  const text = new Compressor().decompress(new Uint8Array(data));

  if (options.outputPath) {
    await writeFile(path.resolve(options.outputPath), text, 'utf8');
  }
  return text;
}

function parseInteger(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isSafeInteger(parsed) || parsed <= 0) {
    throw new Error(`Expected a positive integer, got ${JSON.stringify(value)}`);
  }
  return parsed;
}

interface EncodeFlags {
  input?: string;
  priors?: string;
  alphabet?: string;
  output?: string;
  maxPrecisionBits?: number;
}

interface DecodeFlags {
  output?: string;
}

function registerEncodeCommand(program: Command): void {
  program
    .command('encode')
    .description('Arithmetic-code text under an adaptive Dirichlet model.')
    .argument('[text]', 'Text to encode')
    .option('--input <path>', 'Read the text from a file')
    .option('--priors <path>', 'JSON file of prior counts (symbol → count)')
    .option(
      '--alphabet <symbols>',
      'Give each of these characters a prior count of 1 (default: the text)'
    )
    .option('--output <path>', 'Write the container to this file')
    .option(
      '--max-precision-bits <number>',
      'Fail once the message interval needs more bits than this',
      parseInteger
    )
    .action(async (text: string | undefined, cmdOptions: EncodeFlags) => {
      const result = await runEncodeCommand({
        text,
        inputPath: cmdOptions.input,
        priorsPath: cmdOptions.priors,
        alphabet: cmdOptions.alphabet,
        outputPath: cmdOptions.output,
        maxPrecisionBits: cmdOptions.maxPrecisionBits,
      });
      if (cmdOptions.output) {
        process.stdout.write(`Wrote ${cmdOptions.output}\n`);
      } else {
        process.stdout.write(`${result.code}\n`);
      }
      process.stderr.write(`${formatSummary(result).join('\n')}\n`);
    });
}

function registerDecodeCommand(program: Command): void {
  program
    .command('decode')
    .description('Decode a container written by `encode --output`.')
    .argument('<file>', 'Container file')
    .option('--output <path>', 'Write the text to this file')
    .action(async (file: string, cmdOptions: DecodeFlags) => {
      const text = await runDecodeCommand({
        inputPath: file,
        outputPath: cmdOptions.output,
      });
      if (cmdOptions.output) {
        process.stdout.write(`Wrote ${cmdOptions.output}\n`);
      } else {
        process.stdout.write(`${text}\n`);
      }
    });
}

function createProgram(): Command {
  const program = new Command();
  program
    .name('dyadic-coder')
    .description('Exact arithmetic coding with adaptive symbol counts');
  registerEncodeCommand(program);
  registerDecodeCommand(program);
  return program;
}

function isCommanderHelpDisplayed(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'commander.helpDisplayed'
  );
}

export async function runCli(argv = process.argv): Promise<void> {
  const program = createProgram();
  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (isCommanderHelpDisplayed(error)) {
      return;
    }
    throw error;
  }
}

const entryUrl = process.argv[1]
  ? pathToFileURL(process.argv[1]).href
  : undefined;
if (entryUrl && import.meta.url === entryUrl) {
  runCli(process.argv).catch((error: unknown) => {
    console.error(error instanceof Error ? error.message : error);
    process.exitCode = 1;
  });
}
